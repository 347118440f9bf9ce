/**
 * Validated configuration with provenance.
 *
 * @typeParam T - Shape of the configuration, inferred from the zod schema.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: relayConfigSchema,
 *   sources: [new ObjectSource({ name: "defaults", values }), new EnvSource({ prefix: "MAILRELAY_", delimiter: "__" })],
 * })
 *
 * config.value.server.maxRetries  // 3
 * config.explain("server.maxRetries") // "env"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object, deeply frozen. */
  readonly value: T

  /**
   * Name of the source that provided the value at a dotted path, or "default" when the
   * schema supplied it.
   */
  explain(path: string): string

  /** Names of the sources that contributed at least one value, in application order. */
  sourcesUsed(): string[]

  /** Dotted paths present in the sources but dropped by the schema. */
  unknownKeys(): string[]
}
