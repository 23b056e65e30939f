/**
 * @tally/engine — Fixed-point monetary amounts.
 *
 * An Amount counts 1/10,000th units in a bigint. There is no floating
 * point anywhere between the decimal text that comes in and the decimal
 * text that goes out.
 *
 * Rules:
 * - Four decimal places, always
 * - Extra input digits round half away from zero ("1.23455" → "1.2346")
 * - Values stay inside the signed 64-bit range; leaving it throws OVERFLOW
 */

import { AmountError } from "./types.js";

// ─── Constants ───────────────────────────────────────────────────────────

export const AMOUNT_DECIMALS = 4;

const SCALE = 10n ** BigInt(AMOUNT_DECIMALS);
const MAX_UNITS = 2n ** 63n - 1n;
const MIN_UNITS = -(2n ** 63n);

// Optional sign, integer digits, optional fraction. Either side of the
// point may be empty, but not both (checked after matching).
const DECIMAL_PATTERN = /^([+-]?)(\d*)(?:\.(\d*))?$/;

// ─── Amount ──────────────────────────────────────────────────────────────

/**
 * Immutable fixed-point amount. Every operation returns a new instance.
 */
export class Amount {
  private readonly _units: bigint;

  private constructor(units: bigint) {
    this._units = units;
  }

  /**
   * Parse decimal text.
   *
   * "100" → 1000000 units, "-2.5" → -25000 units, ".5" → 5000 units.
   * Throws AmountError("PARSE_ERROR") on anything that is not a plain
   * decimal number.
   */
  static fromDecimal(text: string): Amount {
    const trimmed = text.trim();
    const match = DECIMAL_PATTERN.exec(trimmed);
    if (match === null) {
      throw new AmountError("PARSE_ERROR", `Invalid amount: "${trimmed}"`);
    }

    const [, sign = "", intPart = "", fracPart = ""] = match;
    if (intPart === "" && fracPart === "") {
      throw new AmountError("PARSE_ERROR", `Invalid amount: "${trimmed}"`);
    }

    const kept = fracPart.slice(0, AMOUNT_DECIMALS).padEnd(AMOUNT_DECIMALS, "0");
    let magnitude = BigInt(intPart === "" ? "0" : intPart) * SCALE + BigInt(kept);

    // The first dropped digit decides: 5 or more rounds the magnitude up.
    if (fracPart.charAt(AMOUNT_DECIMALS) >= "5") {
      magnitude += 1n;
    }

    return Amount.fromUnits(sign === "-" ? -magnitude : magnitude);
  }

  /** Wrap a raw count of 1/10,000th units. */
  static fromUnits(units: bigint): Amount {
    if (units > MAX_UNITS || units < MIN_UNITS) {
      throw new AmountError(
        "OVERFLOW",
        `Amount out of range: ${units.toString()} units`,
      );
    }
    return new Amount(units);
  }

  static zero(): Amount {
    return ZERO;
  }

  get units(): bigint {
    return this._units;
  }

  add(other: Amount): Amount {
    return Amount.fromUnits(this._units + other._units);
  }

  sub(other: Amount): Amount {
    return Amount.fromUnits(this._units - other._units);
  }

  isNegative(): boolean {
    return this._units < 0n;
  }

  isPositive(): boolean {
    return this._units > 0n;
  }

  isZero(): boolean {
    return this._units === 0n;
  }

  compare(other: Amount): -1 | 0 | 1 {
    if (this._units < other._units) return -1;
    if (this._units > other._units) return 1;
    return 0;
  }

  equals(other: Amount): boolean {
    return this._units === other._units;
  }

  /**
   * Render with exactly four fraction digits.
   *
   * 15000n → "1.5000", -25n → "-0.0025", 0n → "0.0000"
   */
  toDecimal(): string {
    const negative = this._units < 0n;
    const abs = negative ? -this._units : this._units;
    const str = abs.toString().padStart(AMOUNT_DECIMALS + 1, "0");
    const intPart = str.slice(0, str.length - AMOUNT_DECIMALS);
    const fracPart = str.slice(str.length - AMOUNT_DECIMALS);
    const result = `${intPart}.${fracPart}`;

    return negative ? `-${result}` : result;
  }

  toString(): string {
    return this.toDecimal();
  }
}

const ZERO = Amount.fromUnits(0n);
