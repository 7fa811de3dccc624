import { found, type LookupResult, type LookupSource, notFound } from "../../ports/source"

export type LookupFunction = (key: string) => string | undefined | Promise<string | undefined>

/**
 * Adapts a plain function into a source. Returning `undefined` means the key
 * is absent; throwing or rejecting is a lookup failure.
 *
 * @example
 * ```ts
 * const vault = new FunctionSource("vault", (key) => secrets.get(key))
 * ```
 */
export class FunctionSource implements LookupSource {
  constructor(
    readonly name: string,
    private readonly fn: LookupFunction,
  ) {}

  async lookup(key: string): Promise<LookupResult> {
    const value = await this.fn(key)

    return value === undefined ? notFound() : found(value)
  }
}
