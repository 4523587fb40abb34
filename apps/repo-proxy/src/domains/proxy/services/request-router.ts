import type { Logger } from "@repoproxy/logger"
import { MAX_REPOSITORY_NAME_LENGTH, type ProxyTarget } from "../model/cache.model"
import { ProxyError } from "../model/proxy.errors"
import type { RepositoryDirectory } from "./repository-directory"

export type ParsedProxyPath = {
  repository: string
  path: string
}

/** "/" becomes "", any trailing slash is dropped. */
export function normalizeBasePath(basePath: string): string {
  return basePath.replace(/\/+$/, "")
}

/**
 * Split `<basePath>/<repository>/<path...>`. Returns `null` for anything that
 * cannot name a cached file.
 */
export function parseProxyPath(pathname: string, basePath = ""): ParsedProxyPath | null {
  const base = normalizeBasePath(basePath)

  if (!pathname.startsWith(`${base}/`)) return null

  const rest = pathname.slice(base.length + 1)
  const slash = rest.indexOf("/")
  if (slash <= 0) return null

  const repository = rest.slice(0, slash)
  const path = rest.slice(slash + 1)

  if (repository.length > MAX_REPOSITORY_NAME_LENGTH) return null
  if (!isSafeRelativePath(path)) return null

  return { repository, path }
}

function isSafeRelativePath(path: string): boolean {
  if (path === "") return false

  return path.split("/").every((segment) => segment !== "" && segment !== "." && segment !== "..")
}

export function joinUpstreamUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/${path}`
}

export type RequestRouterDeps = {
  directory: RepositoryDirectory
  logger: Logger
}

export type RequestRouterOptions = {
  /** @default "/" */
  basePath?: string
}

export class RequestRouter {
  private readonly basePath: string

  constructor(
    private readonly deps: RequestRouterDeps,
    opts: RequestRouterOptions = {},
  ) {
    this.basePath = normalizeBasePath(opts.basePath ?? "/")
  }

  /** Rejects with `repository_not_found` without contacting any upstream. */
  async resolve(pathname: string, logger: Logger = this.deps.logger): Promise<ProxyTarget> {
    const parsed = parseProxyPath(pathname, this.basePath)

    if (!parsed) throw ProxyError.repositoryNotFound({})

    let baseUrl: string | null

    try {
      baseUrl = await this.deps.directory.lookup(parsed.repository)
    } catch (err) {
      const error = ProxyError.repositoryNotFound({
        repository: parsed.repository,
        cause: err,
      })

      logger.error("Repository lookup failed", { err: error })

      throw error
    }

    if (baseUrl === null) {
      throw ProxyError.repositoryNotFound({ repository: parsed.repository })
    }

    return {
      key: { repository: parsed.repository, path: parsed.path },
      url: joinUpstreamUrl(baseUrl, parsed.path),
    }
  }
}
