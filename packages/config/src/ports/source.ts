/**
 * A source of raw configuration values.
 *
 * Sources only load; validation and coercion happen in the schema.
 * Later sources override earlier ones.
 */
export interface ConfigSource {
  /** Provenance label, e.g. "env" or "dotenv:.env.production". */
  readonly name: string

  /** `undefined` for a key means "not provided". */
  load(): Promise<Record<string, unknown>>
}
