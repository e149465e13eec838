const FRACTION_BITS = 32n;
const ONE_RAW = 1n << FRACTION_BITS;
const FRACTION_MASK = ONE_RAW - 1n;
const TWO_POW_32 = 4294967296;

/**
 * Signed Q32.32 fixed-point number held as its raw 64-bit two's-complement pattern.
 *
 * Arithmetic that must be bit-exact (`mul`, `div`, `mod`, rounding) works on the raw value;
 * only ordering and the transcendental builtins go through the float approximation.
 */
export class Fixed {
  private constructor(readonly raw: bigint) {}

  static fromRaw(raw: bigint): Fixed {
    return new Fixed(BigInt.asIntN(64, raw));
  }

  /**
   * `raw = floor(value * 2^32)`. The caller must pass a finite number.
   */
  static fromFloat(value: number): Fixed {
    return Fixed.fromRaw(BigInt(Math.floor(value * TWO_POW_32)));
  }

  static fromInteger(value: bigint): Fixed {
    return Fixed.fromRaw(value << FRACTION_BITS);
  }

  /** Signed upper 32 bits (rounds toward negative infinity). */
  get integerPart(): bigint {
    return this.raw >> FRACTION_BITS;
  }

  /** Unsigned lower 32 bits, read as `fractionalPart / 2^32`. */
  get fractionalPart(): bigint {
    return this.raw & FRACTION_MASK;
  }

  toFloat(): number {
    return Number(this.integerPart) + Number(this.fractionalPart) / TWO_POW_32;
  }

  equals(other: Fixed): boolean {
    return this.raw === other.raw;
  }

  /** Orders by calculated value: negative, zero or positive. */
  compare(other: Fixed): number {
    return Math.sign(this.toFloat() - other.toFloat());
  }

  isZero(): boolean {
    return this.raw === 0n;
  }

  add(other: Fixed): Fixed {
    return Fixed.fromRaw(this.raw + other.raw);
  }

  sub(other: Fixed): Fixed {
    return Fixed.fromRaw(this.raw - other.raw);
  }

  mul(other: Fixed): Fixed {
    return Fixed.fromRaw((this.raw * other.raw) >> FRACTION_BITS);
  }

  /** `undefined` when dividing by zero. */
  div(other: Fixed): Fixed | undefined {
    if (other.isZero()) return undefined;
    return Fixed.fromRaw((this.raw << FRACTION_BITS) / other.raw);
  }

  /** Remainder with the sign of the dividend; `undefined` when dividing by zero. */
  mod(other: Fixed): Fixed | undefined {
    if (other.isZero()) return undefined;
    return Fixed.fromRaw(this.raw % other.raw);
  }

  neg(): Fixed {
    return Fixed.fromRaw(-this.raw);
  }

  abs(): Fixed {
    return this.raw < 0n ? this.neg() : this;
  }

  /** Integer part, toward zero. */
  trunc(): bigint {
    return this.raw >= 0n ? this.raw >> FRACTION_BITS : -(-this.raw >> FRACTION_BITS);
  }

  floor(): bigint {
    return this.raw >> FRACTION_BITS;
  }

  ceil(): bigint {
    return -(-this.raw >> FRACTION_BITS);
  }

  /** Nearest integer, halves away from zero. */
  round(): bigint {
    const half = ONE_RAW >> 1n;
    return this.raw >= 0n
      ? (this.raw + half) >> FRACTION_BITS
      : -((-this.raw + half) >> FRACTION_BITS);
  }

  toString(): string {
    return formatFloat(this.toFloat());
  }
}

/**
 * Decimal text for a fixed-point value that always lexes back as a number literal
 * (never exponent notation, always with a fractional part).
 */
export function formatFloat(value: number): string {
  let text = String(value);
  if (/e/i.test(text)) {
    text = value.toFixed(20).replace(/0+$/, '');
  }
  if (!text.includes('.')) text += '.0';
  if (text.endsWith('.')) text += '0';
  return text;
}

/** The largest magnitude a Q32.32 value can hold. */
export const FIXED_LIMIT = 2 ** 31;

export type PpValue =
  | { type: 'void' }
  | { type: 'integer'; value: bigint }
  | { type: 'number'; value: Fixed }
  | { type: 'boolean'; value: boolean }
  | { type: 'string'; value: string };

export type PpValueType = PpValue['type'];

export type NumericValue = Extract<PpValue, { type: 'integer' | 'number' }>;

export const VOID: PpValue = { type: 'void' };

export function integerValue(value: bigint): PpValue {
  return { type: 'integer', value: BigInt.asIntN(64, value) };
}

export function numberValue(value: Fixed): PpValue {
  return { type: 'number', value };
}

export function booleanValue(value: boolean): PpValue {
  return { type: 'boolean', value };
}

export function stringValue(value: string): PpValue {
  return { type: 'string', value };
}

/**
 * Name reported by `typeof()`.
 */
export function typeOf(value: PpValue): 'void' | 'integer' | 'fixed-point' | 'boolean' | 'string' {
  return value.type === 'number' ? 'fixed-point' : value.type;
}

export function isTruthy(value: PpValue): boolean {
  switch (value.type) {
    case 'void':
      return false;
    case 'integer':
      return value.value !== 0n;
    case 'number':
      return !value.value.isZero();
    case 'boolean':
      return value.value;
    case 'string':
      return value.value.length > 0;
  }
}

export function valueToString(value: PpValue): string {
  switch (value.type) {
    case 'void':
      return 'void';
    case 'integer':
      return value.value.toString();
    case 'number':
      return value.value.toString();
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'string':
      return value.value;
  }
}

export function isNumeric(value: PpValue): value is NumericValue {
  return value.type === 'integer' || value.type === 'number';
}

const FIXED_INTEGER_LIMIT = 1n << 31n;

/** Whether an integer has a Q32.32 representation. */
export function fitsFixed(value: bigint): boolean {
  return value >= -FIXED_INTEGER_LIMIT && value < FIXED_INTEGER_LIMIT;
}

export function toFloat(value: NumericValue): number {
  return value.type === 'integer' ? Number(value.value) : value.value.toFloat();
}
