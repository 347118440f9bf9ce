/**
 * A source of configuration values.
 *
 * A ConfigSource only *loads* raw configuration. It does not validate or coerce.
 * Sources are merged in order, deeply; later sources override earlier ones key by key.
 */
export interface ConfigSource {
  /**
   * Human-readable name for debugging and provenance.
   * Example: "defaults", "json:/usr/local/etc/mailrelayd/mailrelayd.json", "env"
   */
  readonly name: string

  /**
   * Load configuration values.
   *
   * - Env/dotenv sources return string leaves, nested when a delimiter is configured
   * - JSON and object sources may return any JSON value at the leaves
   * - `undefined` at a leaf means "not provided"
   */
  load(): Promise<Record<string, unknown>>
}
