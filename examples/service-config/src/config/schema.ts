import { type LogLevelName, logLevelNames } from "@explicit-config/logger"
import { booleanParser, integerParser, sourced, stringParser } from "@explicit-config/sourced"
import { z } from "zod"

export const serviceConfigSchema = z.object({
  serviceName: sourced(stringParser),

  server: z.object({
    host: sourced(stringParser, { optional: true }),
    port: sourced(integerParser, { optional: true }),
  }),

  logging: z.object({
    level: sourced(z.enum(logLevelNames), { optional: true, typeName: "log level" }),
    prettify: sourced(booleanParser, { optional: true }),
  }),

  database: z.object({
    url: sourced(z.url(), { typeName: "url" }),
    poolSize: sourced(z.number().int().positive(), { optional: true, typeName: "pool size" }),
  }),
})

export type ServiceSettings = z.output<typeof serviceConfigSchema>

export type ServiceConfig = {
  serviceName: string

  server: {
    host: string
    port: number
  }

  logging: {
    level: LogLevelName
    prettify: boolean
  }

  database: {
    url: string
    poolSize: number
  }
}
