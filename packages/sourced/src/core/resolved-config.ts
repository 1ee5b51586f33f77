import type { IResolvedConfig } from "../ports/config"

export class ResolvedConfig<T extends object> implements IResolvedConfig<T> {
  constructor(
    private readonly data: Readonly<T>,
    private readonly provenance: Readonly<Record<string, string>>,
  ) {
    Object.freeze(this.data)
    Object.freeze(this.provenance)
  }

  get value(): Readonly<T> {
    return this.data
  }

  get<K extends keyof T & string>(key: K): T[K] {
    return this.data[key]
  }

  keys(): (keyof T & string)[] {
    return Object.keys(this.data) as Array<keyof T & string>
  }

  explain<K extends keyof T & string>(key: K): string {
    return this.provenance[key] ?? "unset"
  }

  sourcesUsed(): string[] {
    return [...new Set(this.keys().map((k) => this.explain(k)))]
  }
}
