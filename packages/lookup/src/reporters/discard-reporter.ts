import type { Reporter } from "../ports/reporter"

/** Reporter that ignores every entry. Used when a lookup is given none. */
export const discardReporter: Reporter = Object.freeze({
  report(_key: string, _value: unknown): void {},
})
