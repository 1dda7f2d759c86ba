/**
 * Validated configuration with provenance.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({ SERVER_PORT: z.coerce.number().default(8080) }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.get("SERVER_PORT")     // 8080
 * config.explain("SERVER_PORT") // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: Readonly<T>

  get<K extends keyof T & string>(key: K): T[K]

  keys(): (keyof T & string)[]

  /** Name of the source that supplied the final value, or "default". */
  explain<K extends keyof T & string>(key: K): string

  sourcesUsed(): string[]

  /** Keys some source provided that the schema does not define. */
  unknownKeys(): string[]

  /**
   * Copy of the values safe to log: every key in `redact` is masked when set.
   */
  snapshot(redact?: readonly string[]): Record<string, unknown>
}
