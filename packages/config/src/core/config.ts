import type { Config } from "../ports/config"

export class ResolvedConfig<T extends Record<string, unknown>> implements Config<T> {
  constructor(private readonly data: Readonly<T>) {
    Object.freeze(this.data)
  }

  get value(): T {
    return this.data
  }

  get<K extends keyof T & string>(key: K): T[K] {
    return this.data[key]
  }
}
