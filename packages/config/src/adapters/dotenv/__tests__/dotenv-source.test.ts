import * as fs from "node:fs/promises"
import * as os from "node:os"
import * as path from "node:path"
import { DotenvSource } from "../dotenv-source"

describe("DotenvSource", () => {
  let dir: string

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "repoproxy-dotenv-"))
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  it("parses the file relative to cwd", async () => {
    await fs.writeFile(path.join(dir, ".env.test"), "CACHE_DIR=/srv/cache\nSERVER_PORT=6000\n")

    const source = new DotenvSource({ file: ".env.test", required: true, cwd: dir })

    expect(source.name).toBe("dotenv:.env.test")
    expect(await source.load()).toEqual({ CACHE_DIR: "/srv/cache", SERVER_PORT: "6000" })
  })

  it("returns nothing for a missing optional file", async () => {
    const source = new DotenvSource({ file: ".env.missing", required: false, cwd: dir })

    expect(await source.load()).toEqual({})
  })

  it("throws for a missing required file", async () => {
    const source = new DotenvSource({ file: ".env.missing", required: true, cwd: dir })

    await expect(source.load()).rejects.toThrow(/ENOENT/)
  })
})
