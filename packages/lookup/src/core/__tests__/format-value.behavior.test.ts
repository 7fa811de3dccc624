import { Complex } from "../complex"
import { formatValue } from "../format-value"

describe("formatValue", () => {
  it.each([
    [null, ""],
    [undefined, ""],
    ["text", "text"],
    [false, "false"],
    [42, "42"],
    [-4n, "-4"],
    [Number.NaN, "NaN"],
    [new Uint8Array([1, 2, 3]), "[1 2 3]"],
    [new Uint8Array(0), "[]"],
    [new Complex(3, 4), "(3+4i)"],
    [new Complex(1.5, -0), "(1.5-0i)"],
  ])("formats %s as %j", (value, expected) => {
    expect(formatValue(value)).toBe(expected)
  })
})
