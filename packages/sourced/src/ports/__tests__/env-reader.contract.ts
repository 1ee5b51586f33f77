import type { EnvReader } from "../env-reader"

export type EnvReaderHarness = {
  name: string
  make: () => {
    reader: EnvReader
    set: (varName: string, value: string | undefined) => void
    cleanup?: () => void
  }
}

export function describeEnvReaderContract(h: EnvReaderHarness) {
  describe(`${h.name} (EnvReader contract)`, () => {
    let reader: EnvReader
    let set: (varName: string, value: string | undefined) => void
    let cleanup: (() => void) | undefined

    beforeEach(() => {
      const made = h.make()

      reader = made.reader
      set = made.set
      cleanup = made.cleanup
    })

    afterEach(() => {
      cleanup?.()
    })

    it("has a name", () => {
      expect(typeof reader.name).toBe("string")
      expect(reader.name.length).toBeGreaterThan(0)
    })

    it("returns a set variable", () => {
      set("EXPLICIT_CONFIG_CONTRACT_VAR", "value-1")

      expect(reader.get("EXPLICIT_CONFIG_CONTRACT_VAR")).toBe("value-1")
    })

    it("returns undefined for an unset variable", () => {
      set("EXPLICIT_CONFIG_CONTRACT_VAR", undefined)

      expect(reader.get("EXPLICIT_CONFIG_CONTRACT_VAR")).toBeUndefined()
    })

    it("treats an empty string as set", () => {
      set("EXPLICIT_CONFIG_CONTRACT_VAR", "")

      expect(reader.get("EXPLICIT_CONFIG_CONTRACT_VAR")).toBe("")
    })

    it("sees changes made after construction", () => {
      set("EXPLICIT_CONFIG_CONTRACT_VAR", "before")
      expect(reader.get("EXPLICIT_CONFIG_CONTRACT_VAR")).toBe("before")

      set("EXPLICIT_CONFIG_CONTRACT_VAR", "after")
      expect(reader.get("EXPLICIT_CONFIG_CONTRACT_VAR")).toBe("after")

      set("EXPLICIT_CONFIG_CONTRACT_VAR", undefined)
      expect(reader.get("EXPLICIT_CONFIG_CONTRACT_VAR")).toBeUndefined()
    })
  })
}
