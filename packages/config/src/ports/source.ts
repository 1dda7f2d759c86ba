/**
 * A source of raw configuration values.
 *
 * Sources only load. Coercion and validation happen in `loadConfig`, and
 * when several sources are given, later ones override earlier ones.
 */
export interface ConfigSource {
  /** Used for provenance, e.g. "env" or "dotenv:.env". */
  readonly name: string

  load(): Promise<Record<string, string | undefined>>
}
