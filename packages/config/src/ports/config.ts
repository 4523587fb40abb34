export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object */
  readonly value: T

  /** Name of the source that supplied `key`, or "default" when the schema did. */
  explain<K extends keyof T & string>(key: K): string

  /** Sources that contributed at least one value, in application order. */
  sourcesUsed(): string[]

  /** Keys present in the sources but not in the schema. */
  unknownKeys(): string[]
}
