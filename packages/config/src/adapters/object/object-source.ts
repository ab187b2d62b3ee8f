import type { ConfigSource } from "../../ports/source"

/**
 * Fixed values, typically programmatic overrides applied last.
 */
export class ObjectSource implements ConfigSource {
  constructor(
    private readonly obj: Record<string, unknown>,
    readonly name: string = "object:overrides",
  ) {}

  async load(): Promise<Record<string, unknown>> {
    return { ...this.obj }
  }
}
