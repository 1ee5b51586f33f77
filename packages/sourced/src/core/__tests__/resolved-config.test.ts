import { ResolvedConfig } from "../resolved-config"

describe("ResolvedConfig", () => {
  const config = new ResolvedConfig(
    { port: 8080, host: "db.internal", debug: false, workers: 4 },
    { port: "literal", host: "env:APP_HOST", debug: "default", workers: "literal" },
  )

  it("returns values by key", () => {
    const port: number = config.get("port")

    expect(port).toBe(8080)
    expect(config.get("host")).toBe("db.internal")
    expect(config.value).toEqual({ port: 8080, host: "db.internal", debug: false, workers: 4 })
  })

  it("lists keys", () => {
    expect(config.keys()).toEqual(["port", "host", "debug", "workers"])
  })

  it("explains the provenance of each key", () => {
    expect(config.explain("port")).toBe("literal")
    expect(config.explain("host")).toBe("env:APP_HOST")
    expect(config.explain("debug")).toBe("default")
  })

  it("lists unique sources in field order", () => {
    expect(config.sourcesUsed()).toEqual(["literal", "env:APP_HOST", "default"])
  })

  it("freezes its values", () => {
    expect(Object.isFrozen(config.value)).toBe(true)
  })
})
