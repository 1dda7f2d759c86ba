import fs from "node:fs/promises"
import path from "node:path"

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

/**
 * Reads `file` relative to `cwd`. A missing file yields undefined unless
 * `required` is set.
 */
export async function readOptionalFile(
  file: string,
  { required, cwd = process.cwd() }: { required: boolean; cwd?: string | undefined },
): Promise<string | undefined> {
  try {
    return await fs.readFile(path.resolve(cwd, file), "utf-8")
  } catch (err) {
    if (!required && isNotFound(err)) return undefined
    throw err
  }
}
