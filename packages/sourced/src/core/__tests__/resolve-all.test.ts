import { Writable } from "node:stream"
import { type Logger, PinoLogger } from "@explicit-config/logger"
import { mock } from "vitest-mock-extended"
import { RecordEnvReader } from "../../adapters/env/record-env-reader"
import { ConfigResolutionError } from "../errors"
import { booleanParser, integerParser, numberParser, stringParser } from "../parsers"
import { resolveAll } from "../resolve-all"
import { SourcedValue } from "../sourced-value"

describe("resolveAll", () => {
  it("resolves every field from its own source", () => {
    const env = new RecordEnvReader({ APP_HOST: "db.internal" })

    const result = resolveAll(
      {
        port: SourcedValue.literal(8080, integerParser),
        host: SourcedValue.env("APP_HOST", stringParser),
      },
      { env },
    )

    expect(result.success).toBe(true)
    if (!result.success) return

    const port: number = result.config.get("port")

    expect(port).toBe(8080)
    expect(result.config.value).toEqual({ port: 8080, host: "db.internal" })
    expect(result.config.explain("host")).toBe("env:APP_HOST")
  })

  it("uses defaults for unset fields only", () => {
    const result = resolveAll(
      {
        port: SourcedValue.unset(integerParser),
        debug: SourcedValue.literal(true, booleanParser),
      },
      { defaults: { port: 3000, debug: false } },
    )

    expect(result.success).toBe(true)
    if (!result.success) return

    expect(result.config.value).toEqual({ port: 3000, debug: true })
    expect(result.config.explain("port")).toBe("default")
    expect(result.config.explain("debug")).toBe("literal")
  })

  it("does not mask a failing environment source with a default", () => {
    const result = resolveAll(
      { port: SourcedValue.env("APP_PORT", integerParser) },
      { env: new RecordEnvReader({}), defaults: { port: 3000 } },
    )

    expect(result.success).toBe(false)
    if (result.success) return

    expect(result.error.failures.map((f) => f.error.code)).toEqual(["missing_env_var"])
  })

  it("fails as a whole and lists every failing field", () => {
    const env = new RecordEnvReader({ TIMEOUT_SECONDS: "abc" })

    const result = resolveAll(
      {
        port: SourcedValue.literal(8080, integerParser),
        timeout: SourcedValue.env("TIMEOUT_SECONDS", integerParser),
        host: SourcedValue.env("MY_ENV_VAR_FOR_HOST", stringParser),
        debug: SourcedValue.unset(booleanParser),
      },
      { env },
    )

    expect(result.success).toBe(false)
    if (result.success) return

    expect(result.error).toBeInstanceOf(ConfigResolutionError)
    expect(
      result.error.failures.map((f) => [f.field, f.source, f.error.code]),
    ).toEqual([
      ["timeout", "env:TIMEOUT_SECONDS", "parse_failure"],
      ["host", "env:MY_ENV_VAR_FOR_HOST", "missing_env_var"],
      ["debug", "unset", "no_source_provided"],
    ])
  })

  it("logs provenance, never values", () => {
    const logger = mock<Logger>()
    const env = new RecordEnvReader({ API_TOKEN: "test-secret" })

    const result = resolveAll(
      {
        token: SourcedValue.env("API_TOKEN", stringParser),
        region: SourcedValue.env("APP_REGION", stringParser),
      },
      { env, logger },
    )

    expect(result.success).toBe(false)
    expect(logger.debug).toHaveBeenCalledTimes(1)
    expect(logger.debug).toHaveBeenCalledWith("resolved config field", {
      field: "token",
      source: "env:API_TOKEN",
    })
    expect(logger.warn).toHaveBeenCalledTimes(1)
    expect(logger.warn).toHaveBeenCalledWith(
      "config field failed to resolve",
      expect.objectContaining({ field: "region", source: "env:APP_REGION" }),
    )
  })

  it("keeps the text of an unparseable variable out of the log", () => {
    const lines: string[] = []
    const destination = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        lines.push(chunk.toString("utf8").trim())
        callback()
      },
    })

    const result = resolveAll(
      { port: SourcedValue.env("DB_PORT", numberParser) },
      {
        env: new RecordEnvReader({ DB_PORT: "test-secret" }),
        logger: new PinoLogger({ destination }, { level: "debug" }),
      },
    )

    expect(result.success).toBe(false)
    expect(lines).toHaveLength(1)

    const line = JSON.parse(lines[0] ?? "{}")

    expect(line.msg).toBe("config field failed to resolve")
    expect(line.err.code).toBe("parse_failure")
    expect(line.err.context).toEqual({
      varName: "DB_PORT",
      targetType: "number",
      reason: "expected a number",
    })
    expect(lines[0]?.includes("test-secret")).toBe(false)
  })

  it("returns an empty config for no fields", () => {
    const result = resolveAll({})

    expect(result.success).toBe(true)
    if (!result.success) return

    expect(result.config.keys()).toEqual([])
    expect(result.config.sourcesUsed()).toEqual([])
  })
})
