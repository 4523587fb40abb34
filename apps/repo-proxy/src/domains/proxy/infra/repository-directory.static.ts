import type { RepositoryDirectory } from "../services/repository-directory"

/** Fixed name to base URL map, typically from configuration. */
export class RepositoryDirectoryStatic implements RepositoryDirectory {
  private readonly entries: ReadonlyMap<string, string>

  constructor(entries: Record<string, string>) {
    this.entries = new Map(Object.entries(entries))
  }

  async lookup(name: string): Promise<string | null> {
    return this.entries.get(name) ?? null
  }
}
