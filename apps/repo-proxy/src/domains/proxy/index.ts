export { createProxyModule } from "./api"
export { createProxyServices, type ProxyServices } from "./composition"
