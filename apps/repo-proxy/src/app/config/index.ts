export { loadAppConfig, mapEnvToConfig, parseRepositoryList } from "./load-app-config"
export type { AppConfig, EnvConfig, RepositorySource } from "./schema"
