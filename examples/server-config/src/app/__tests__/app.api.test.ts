import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { createNullLogger } from "@keyfill/logger"
import type { Hono } from "hono"
import { loadAppConfig } from "../config/load-app-config"
import { createApp } from "../create-app"

describe("server-config API", () => {
  let cwd: string
  let app: Hono

  beforeAll(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "server-api-"))
    const config = await loadAppConfig({ argv: [], env: { MAX_IMAGE_PIXELS: "1000000" }, cwd })
    app = createApp({ config, logger: createNullLogger() })
  })

  afterAll(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  const postJson = (body: string) =>
    app.request("/resize", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body,
    })

  it("reports health", async () => {
    const res = await app.request("/health")

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ status: "ok" })
  })

  it("reads resize parameters from the query string", async () => {
    const res = await app.request("/resize?width=640&height=480&crop")

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({
      width: 640,
      height: 480,
      quality: 80,
      crop: true,
      pixels: 307_200,
    })
  })

  it("reads resize parameters from a JSON body", async () => {
    const res = await postJson(JSON.stringify({ width: 800, height: 600, quality: 95 }))

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({
      width: 800,
      height: 600,
      quality: 95,
      crop: false,
      pixels: 480_000,
    })
  })

  it("reads resize parameters from a form body", async () => {
    const res = await app.request("/resize", {
      method: "POST",
      body: new URLSearchParams({ width: "100", height: "50", crop: "false" }),
    })

    expect(await res.json()).toEqual({
      width: 100,
      height: 50,
      quality: 80,
      crop: false,
      pixels: 5_000,
    })
  })

  it("rejects parameters that do not convert", async () => {
    const res = await postJson(JSON.stringify({ width: "wide", height: 600 }))

    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({
      error: "type_coercion_failed",
      message: 'value "wide" for field "width" is not uint16: invalid integer "wide"',
    })
  })

  it("rejects missing parameters", async () => {
    const res = await app.request("/resize?width=640")

    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({
      error: "missing_required_field",
      message: 'missing value for required field "height"',
    })
  })

  it("treats an unreadable JSON body as having no parameters", async () => {
    const res = await postJson("{")

    expect(res.status).toBe(400)
    expect(await res.json()).toMatchObject({ error: "missing_required_field" })
  })

  it("enforces the configured pixel limit", async () => {
    const res = await app.request("/resize?width=2000&height=1000")

    expect(res.status).toBe(422)
    expect(await res.json()).toEqual({
      error: "image_too_large",
      message: "2000000 pixels exceeds 1000000",
    })
  })

  it("explains where each setting came from", async () => {
    const res = await app.request("/config")
    const body = await res.json()

    expect(body).toMatchObject({
      entries: { MAX_IMAGE_PIXELS: "1000000", SERVER_PORT: "4663", API_TOKEN: "(empty)" },
      provenance: { maxImagePixels: "env", port: "defaults", apiToken: "missing" },
      sources: ["defaults", "env"],
    })
  })
})
