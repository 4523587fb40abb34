export interface RepositoryDirectory {
  /** Base URL of the named repository, or `null` when it is not mapped. */
  lookup(name: string): Promise<string | null>
}
