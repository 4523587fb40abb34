import { z } from "zod/mini"
import type { RepositoryDirectory } from "../services/repository-directory"
import type { PgQueryable } from "./postgres"

const SELECT_BASE_URL = "select baseurl from repomap where reponame = $1 limit 1"

const repositoryRow = z.object({
  baseurl: z.nullable(z.string()),
})

export type RepositoryDirectoryPostgresDeps = {
  pool: PgQueryable
}

export class RepositoryDirectoryPostgres implements RepositoryDirectory {
  constructor(private readonly deps: RepositoryDirectoryPostgresDeps) {}

  async lookup(name: string): Promise<string | null> {
    const { rows } = await this.deps.pool.query(SELECT_BASE_URL, [name])

    const [first] = rows
    if (first === undefined) return null

    const baseUrl = z.parse(repositoryRow, first).baseurl

    return baseUrl === null || baseUrl === "" ? null : baseUrl
  }
}
