import type { Logger } from "@explicit-config/logger"
import { type EnvReader, resolveAll } from "@explicit-config/sourced"
import { type ServiceConfig, type ServiceSettings, serviceConfigSchema } from "./schema"

export type LoadServiceConfigOptions = {
  /** @default a reader over `process.env` */
  env?: EnvReader
  logger?: Logger
}

export type LoadedServiceConfig = {
  config: ServiceConfig

  /** Provenance of every resolved field, keyed by its dotted path. */
  sources: Record<string, string>
}

export function flattenSettings(settings: ServiceSettings) {
  return {
    serviceName: settings.serviceName,
    "server.host": settings.server.host,
    "server.port": settings.server.port,
    "logging.level": settings.logging.level,
    "logging.prettify": settings.logging.prettify,
    "database.url": settings.database.url,
    "database.poolSize": settings.database.poolSize,
  }
}

/**
 * Reads the service settings from an already-parsed document and resolves
 * every field.
 *
 * Throws the `ZodError` when the document is malformed, or the
 * `ConfigResolutionError` listing every field that failed to resolve.
 */
export function loadServiceConfig(
  document: unknown,
  options: LoadServiceConfigOptions = {},
): LoadedServiceConfig {
  const settings = serviceConfigSchema.parse(document)

  const result = resolveAll(flattenSettings(settings), {
    env: options.env,
    logger: options.logger?.child({ module: "config" }),
    defaults: {
      "server.host": "0.0.0.0",
      "server.port": 4663,
      "logging.level": "info",
      "logging.prettify": false,
      "database.poolSize": 10,
    },
  })

  if (!result.success) throw result.error

  const { config: resolved } = result
  const sources: Record<string, string> = {}

  for (const key of resolved.keys()) {
    sources[key] = resolved.explain(key)
  }

  return {
    config: {
      serviceName: resolved.get("serviceName"),
      server: {
        host: resolved.get("server.host"),
        port: resolved.get("server.port"),
      },
      logging: {
        level: resolved.get("logging.level"),
        prettify: resolved.get("logging.prettify"),
      },
      database: {
        url: resolved.get("database.url"),
        poolSize: resolved.get("database.poolSize"),
      },
    },
    sources,
  }
}
