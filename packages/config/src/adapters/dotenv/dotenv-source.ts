import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import type { ConfigSource } from "../../ports/source"

export type DotenvSourceOptions = {
  /**
   * Absolute, or relative to `cwd`.
   *
   * @example ".env", ".env.production"
   */
  file: string

  /**
   * When false, a missing file loads as an empty source.
   */
  required: boolean

  /**
   * Only keys starting with the prefix are loaded, with the prefix removed.
   */
  prefix?: string

  /**
   * @default process.cwd()
   */
  cwd?: string
}

export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const filePath = path.resolve(this.opts.cwd ?? process.cwd(), this.opts.file)

    let content: string
    try {
      content = await fs.readFile(filePath, "utf-8")
    } catch (err) {
      if (!this.opts.required && isFileNotFound(err)) return {}
      throw err
    }

    return this.stripPrefix(parse(content))
  }

  private stripPrefix(values: Record<string, string>): Record<string, string> {
    const prefix = this.opts.prefix
    if (!prefix) return values

    const out: Record<string, string> = {}

    for (const [key, value] of Object.entries(values)) {
      if (key.startsWith(prefix) && key.length > prefix.length) {
        out[key.slice(prefix.length)] = value
      }
    }

    return out
  }
}

function isFileNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}
