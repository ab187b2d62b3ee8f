import { prettifyError, safeParse } from "zod/mini"
import type { $ZodType } from "zod/v4/core"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"
import { ConfigValidationError } from "./errors"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: $ZodType<T>
  /**
   * Applied in order. Defaults to the process environment.
   */
  sources?: readonly ConfigSource[]
}

export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}
  const resolvedSources = sources ?? [new EnvSource()]

  for (const source of resolvedSources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        merged[key] = value
        provenance[key] = source.name
      }
    }
  }

  const result = safeParse(schema, merged)

  if (!result.success) {
    throw new ConfigValidationError(
      prettifyError(result.error),
      resolvedSources.map((s) => s.name),
    )
  }

  return new Config(result.data, provenance, new Set(Object.keys(merged)))
}
