import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import { stripPrefix } from "../../core/strip-prefix"
import type { ConfigSource } from "../../ports/source"

export type DotenvSourceOptions = {
  /** Absolute, or relative to `cwd`. */
  file: string

  /** When false, a missing file loads as an empty object. */
  required: boolean

  /** @default process.cwd() */
  cwd?: string

  /** Only keys starting with the prefix are loaded, with the prefix stripped. */
  prefix?: string
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const cwd = this.opts.cwd ?? process.cwd()
    const filePath = path.resolve(cwd, this.opts.file)

    try {
      const content = await fs.readFile(filePath, "utf-8")

      return stripPrefix(parse(content), this.opts.prefix ?? "")
    } catch (err) {
      if (!this.opts.required && isMissingFile(err)) {
        return {}
      }
      throw err
    }
  }
}
