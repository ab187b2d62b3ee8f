import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { DotenvSource } from "../dotenv-source"

describe("DotenvSource behavior", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "dotenv-test-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true })
  })

  it("parses quoted values and ignores comments", async () => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      "# cache settings\nENVIRONMENT='staging'\nKEYSPACE_PREFIX=\"app:\"\n",
    )

    const source = new DotenvSource({ file: ".env", required: true, cwd })

    expect(await source.load()).toEqual({ ENVIRONMENT: "staging", KEYSPACE_PREFIX: "app:" })
  })

  it("filters and strips the prefix", async () => {
    await fs.writeFile(path.join(cwd, ".env"), "TAGSTASH_BATCH_SIZE=10\nOTHER=1\n")

    const source = new DotenvSource({ file: ".env", required: true, prefix: "TAGSTASH_", cwd })

    expect(await source.load()).toEqual({ BATCH_SIZE: "10" })
  })

  it("returns an empty object when the file is missing and not required", async () => {
    const source = new DotenvSource({ file: ".env.missing", required: false, cwd })

    expect(await source.load()).toEqual({})
  })

  it("rejects when the file is missing and required", async () => {
    const source = new DotenvSource({ file: ".env.missing", required: true, cwd })

    await expect(source.load()).rejects.toMatchObject({ code: "ENOENT" })
  })
})
