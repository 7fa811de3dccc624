import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { field } from "../../../core/fields"
import { lookup } from "../../../core/lookup"
import { defineRecord } from "../../../core/record-schema"
import { isLookupError } from "../../../errors/is-lookup-error"
import { JsonFileSource } from "../json-file-source"

describe("JsonFileSource behavior", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "json-test-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true })
  })

  async function writeConfig(content: string, file = "config.json") {
    await fs.writeFile(path.join(cwd, file), content)
  }

  it("renders scalars as text", async () => {
    await writeConfig(JSON.stringify({ PORT: 3000, HOST: "localhost", DEBUG: true, RATIO: 0.5 }))

    const source = new JsonFileSource({ file: "config.json", cwd })

    await expect(source.lookup("PORT")).resolves.toEqual({ value: "3000", found: true })
    await expect(source.lookup("HOST")).resolves.toEqual({ value: "localhost", found: true })
    await expect(source.lookup("DEBUG")).resolves.toEqual({ value: "true", found: true })
    await expect(source.lookup("RATIO")).resolves.toEqual({ value: "0.5", found: true })
  })

  it("renders nested values as JSON", async () => {
    await writeConfig(
      JSON.stringify({ db: { host: "localhost", port: 5432 }, hosts: ["a", "b"] }),
    )

    const source = new JsonFileSource({ file: "config.json", cwd })

    await expect(source.lookup("db")).resolves.toEqual({
      value: '{"host":"localhost","port":5432}',
      found: true,
    })
    await expect(source.lookup("hosts")).resolves.toEqual({ value: '["a","b"]', found: true })
  })

  it("treats null members as absent", async () => {
    await writeConfig(JSON.stringify({ HOST: null }))

    const source = new JsonFileSource({ file: "config.json", cwd })

    await expect(source.lookup("HOST")).resolves.toEqual({ value: "", found: false })
  })

  it("does not find inherited object properties", async () => {
    await writeConfig("{}")

    const source = new JsonFileSource({ file: "config.json", cwd })

    await expect(source.lookup("toString")).resolves.toEqual({ value: "", found: false })
  })

  it("has no keys when the file is missing and not required", async () => {
    const source = new JsonFileSource({ file: "config.json", required: false, cwd })

    await expect(source.lookup("PORT")).resolves.toEqual({ value: "", found: false })
  })

  it("fails when the file is missing and required", async () => {
    const source = new JsonFileSource({ file: "config.json", cwd })

    await expect(source.lookup("PORT")).rejects.toMatchObject({
      code: "source_unavailable",
      context: { source: "json:config.json" },
    })
  })

  it("fails on invalid JSON and repeats the failure", async () => {
    await writeConfig("{ invalid json }")

    const source = new JsonFileSource({ file: "config.json", cwd })
    const first = await source.lookup("PORT").catch((err: unknown) => err)
    await writeConfig(JSON.stringify({ PORT: 3000 }))
    const second = await source.lookup("PORT").catch((err: unknown) => err)

    expect(isLookupError(first, "source_unavailable")).toBe(true)
    expect(second).toBe(first)
  })

  it("fails when the document is not an object", async () => {
    await writeConfig(JSON.stringify(["PORT", 3000]))

    const source = new JsonFileSource({ file: "config.json", cwd })

    await expect(source.lookup("PORT")).rejects.toThrow(
      'source "json:config.json" is unavailable: expected a JSON object',
    )
  })

  it("parses the file once for concurrent lookups", async () => {
    await writeConfig(JSON.stringify({ A: "1", B: "2" }))
    const readFile = vi.spyOn(fs, "readFile")

    const source = new JsonFileSource({ file: "config.json", cwd })
    const results = await Promise.all([source.lookup("A"), source.lookup("B")])

    expect(results).toEqual([
      { value: "1", found: true },
      { value: "2", found: true },
    ])
    expect(readFile).toHaveBeenCalledTimes(1)
  })

  it("resolves path relative to cwd", async () => {
    const subdir = path.join(cwd, "config")
    await fs.mkdir(subdir)
    await fs.writeFile(path.join(subdir, "app.json"), JSON.stringify({ KEY: "value" }))

    const source = new JsonFileSource({ file: "app.json", cwd: subdir })

    expect(source.name).toBe("json:app.json")
    await expect(source.lookup("KEY")).resolves.toEqual({ value: "value", found: true })
  })

  it("fails on integers the parser could not hold exactly", async () => {
    await writeConfig('{"ID": 9007199254740993, "SAFE": 9007199254740991}')

    const source = new JsonFileSource({ file: "config.json", cwd })

    await expect(source.lookup("SAFE")).resolves.toEqual({
      value: "9007199254740991",
      found: true,
    })
    await expect(source.lookup("ID")).rejects.toThrow(
      'source "json:config.json" is unavailable: member "ID" is an integer beyond 9007199254740991 and lost precision when parsed',
    )
  })

  it("does not set an int64 field from a rounded integer", async () => {
    await writeConfig('{"ID": 9007199254740993}')
    const Ids = defineRecord({ id: field.int64({ lookup: "ID" }) })
    const record = Ids.zero()

    const err = await lookup(record, {
      schema: Ids,
      sources: [new JsonFileSource({ file: "config.json", cwd })],
    }).catch((e: unknown) => e)

    expect(isLookupError(err, "source_lookup_failed")).toBe(true)
    expect(record.id).toBe(0n)
  })
})
