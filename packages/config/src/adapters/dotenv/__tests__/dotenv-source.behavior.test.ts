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

  it("is named after the file", () => {
    expect(new DotenvSource({ file: ".env.local", required: false, cwd }).name).toBe(
      "dotenv:.env.local",
    )
  })

  it("parses quoted values and ignores comments", async () => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      `# credentials\nAPI_KEY='rs_test_key'\nBASE_URL="http://localhost:8080"\nTIMEOUT_MS=5000`,
    )

    const result = await new DotenvSource({ file: ".env", required: true, cwd }).load()

    expect(result).toEqual({
      API_KEY: "rs_test_key",
      BASE_URL: "http://localhost:8080",
      TIMEOUT_MS: "5000",
    })
  })

  it("returns an empty object when the file is missing and optional", async () => {
    const result = await new DotenvSource({ file: ".env", required: false, cwd }).load()

    expect(result).toEqual({})
  })

  it("rejects with ENOENT when the file is missing and required", async () => {
    const source = new DotenvSource({ file: ".env", required: true, cwd })

    await expect(source.load()).rejects.toMatchObject({ code: "ENOENT" })
  })

  it("rethrows errors other than a missing file", async () => {
    await fs.mkdir(path.join(cwd, ".env"))
    const source = new DotenvSource({ file: ".env", required: false, cwd })

    await expect(source.load()).rejects.toMatchObject({ code: "EISDIR" })
  })

  it("filters and strips a prefix", async () => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      "RENDERSCREENSHOT_API_KEY=rs_test_key\nOTHER=ignored",
    )

    const source = new DotenvSource({
      file: ".env",
      required: true,
      cwd,
      prefix: "RENDERSCREENSHOT_",
    })

    expect(await source.load()).toEqual({ API_KEY: "rs_test_key" })
  })
})
