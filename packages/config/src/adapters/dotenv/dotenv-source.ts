import { parse } from "dotenv"
import type { ConfigSource } from "../../ports/source"
import { readOptionalFile } from "../fs/read-optional-file"

export type DotenvSourceOptions = {
  /** Absolute, or relative to `cwd`. */
  file: string

  /** When false a missing file loads as empty. */
  required: boolean

  /** @default process.cwd() */
  cwd?: string
}

export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, string | undefined>> {
    const content = await readOptionalFile(this.opts.file, this.opts)

    return content === undefined ? {} : { ...parse(content) }
  }
}
