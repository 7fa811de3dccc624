import { blankPrefixLength, expectLineEnd, scanLine, tokenScanner } from "../scan"

const word = tokenScanner((token) => token.toUpperCase())

describe("scan", () => {
  it("measures leading blanks without crossing a line break", () => {
    expect(blankPrefixLength(" \t x")).toBe(3)
    expect(blankPrefixLength("  \n x")).toBe(2)
    expect(blankPrefixLength("x")).toBe(0)
  })

  it("accepts blanks followed by the end of the line", () => {
    expect(() => expectLineEnd("")).not.toThrow()
    expect(() => expectLineEnd("  ")).not.toThrow()
    expect(() => expectLineEnd(" \r\nmore")).not.toThrow()
    expect(() => expectLineEnd(" x")).toThrow("expected newline")
  })

  it("reads one token from the first line", () => {
    expect(scanLine("  abc  \nnext", word)).toBe("ABC")
  })

  it("fails on an empty first line", () => {
    expect(() => scanLine("  \nabc", word)).toThrow("unexpected newline")
  })

  it("fails when more than one token is on the line", () => {
    expect(() => scanLine("abc def", word)).toThrow("expected newline")
  })

  it("rejects scanners that report consuming more than the input", () => {
    const liar = { scan: () => ({ value: 1, consumed: 10 }) }

    expect(() => scanLine("abc", liar)).toThrow("scan consumed more than its input")
  })
})
