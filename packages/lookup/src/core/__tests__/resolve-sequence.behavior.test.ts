import type { Logger } from "@keyfill/logger"
import { mock } from "vitest-mock-extended"
import { MapSource } from "../../adapters/map/map-source"
import { found, type LookupSource, notFound } from "../../ports/source"
import { resolveKey } from "../resolve-sequence"

function source(name: string) {
  return mock<LookupSource>({ name })
}

describe("resolveKey", () => {
  it("returns absent with an empty value for no sources", async () => {
    await expect(resolveKey("K", [])).resolves.toEqual({ status: "absent", value: "" })
  })

  it("stops at the first source that has the key", async () => {
    const a = source("a")
    const b = source("b")
    const c = source("c")
    a.lookup.mockResolvedValue(notFound())
    b.lookup.mockResolvedValue(found("x"))
    c.lookup.mockResolvedValue(found("y"))

    await expect(resolveKey("K", [a, b, c])).resolves.toEqual({
      status: "found",
      value: "x",
      source: "b",
    })
    expect(a.lookup).toHaveBeenCalledWith("K")
    expect(b.lookup).toHaveBeenCalledWith("K")
    expect(c.lookup).not.toHaveBeenCalled()
  })

  it("returns a found empty value", async () => {
    await expect(resolveKey("K", [new MapSource({ K: "" })])).resolves.toEqual({
      status: "found",
      value: "",
      source: "defaults",
    })
  })

  it("skips a failing source when a later one has the key", async () => {
    const a = source("a")
    const b = source("b")
    const logger = mock<Logger>()
    const failure = new Error("connection refused")
    a.lookup.mockRejectedValue(failure)
    b.lookup.mockResolvedValue(found("x"))

    await expect(resolveKey("K", [a, b], logger)).resolves.toEqual({
      status: "found",
      value: "x",
      source: "b",
    })
    expect(logger.debug).toHaveBeenCalledWith("source failed, trying next", {
      key: "K",
      source: "a",
      err: failure,
    })
  })

  it("returns the last source's absence when nothing has the key", async () => {
    const a = source("a")
    const b = source("b")
    a.lookup.mockRejectedValue(new Error("ignored"))
    b.lookup.mockResolvedValue(notFound())

    await expect(resolveKey("K", [a, b])).resolves.toEqual({
      status: "absent",
      value: "",
      source: "b",
    })
  })

  it("returns the last source's failure when nothing has the key", async () => {
    const a = source("a")
    const b = source("b")
    const failure = new Error("timeout")
    a.lookup.mockResolvedValue(notFound())
    b.lookup.mockRejectedValue(failure)

    await expect(resolveKey("K", [a, b])).resolves.toEqual({
      status: "failed",
      error: failure,
      source: "b",
    })
  })

  it("passes the last source's raw value through on absence", async () => {
    const a = source("a")
    a.lookup.mockResolvedValue({ value: "stale", found: false })

    await expect(resolveKey("K", [a])).resolves.toEqual({
      status: "absent",
      value: "stale",
      source: "a",
    })
  })
})
