/**
 * A complex number with double-precision components.
 */
export class Complex {
  constructor(
    readonly real: number,
    readonly imag: number,
  ) {}

  static readonly zero = new Complex(0, 0)

  equals(other: Complex): boolean {
    return Object.is(this.real, other.real) && Object.is(this.imag, other.imag)
  }

  /** Renders as `(3+4i)`. */
  toString(): string {
    const sign = this.imag < 0 || Object.is(this.imag, -0) ? "-" : "+"

    return `(${this.real}${sign}${Math.abs(this.imag)}i)`
  }
}
