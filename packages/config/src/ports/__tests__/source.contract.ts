import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import type { ConfigSource } from "../source"

export type ConfigSourceContractOptions = {
  name: string
  make: (cwd: string) => ConfigSource
  setup: (cwd: string) => Promise<void>
  expectedValue: Record<string, unknown>
}

export function describeConfigSourceContract(opts: ConfigSourceContractOptions): void {
  describe(`ConfigSource contract - ${opts.name}`, () => {
    let cwd: string

    beforeEach(async () => {
      cwd = await fs.mkdtemp(path.join(os.tmpdir(), "config-source-"))
      await opts.setup(cwd)
    })

    afterEach(async () => {
      await fs.rm(cwd, { recursive: true })
    })

    it("has a non-empty name", () => {
      expect(opts.make(cwd).name.length).toBeGreaterThan(0)
    })

    it("loads the expected values", async () => {
      expect(await opts.make(cwd).load()).toEqual(opts.expectedValue)
    })

    it("returns a fresh object on every load", async () => {
      const source = opts.make(cwd)

      const first = await source.load()
      first.MUTATED = "yes"

      expect(await source.load()).toEqual(opts.expectedValue)
    })
  })
}
