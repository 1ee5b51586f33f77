export { flattenSettings, loadServiceConfig } from "./config/load-service-config"
export type { LoadedServiceConfig, LoadServiceConfigOptions } from "./config/load-service-config"
export { serviceConfigSchema } from "./config/schema"
export type { ServiceConfig, ServiceSettings } from "./config/schema"
