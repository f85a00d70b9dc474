/**
 * Fixed-point decimal arithmetic on bigint
 * @module invoice/decimal
 */

const DECIMAL_PATTERN = /^([+-]?)(\d*)(?:\.(\d*))?(?:e([+-]?\d+))?$/i;

function pow10(exponent: number): bigint {
  return 10n ** BigInt(exponent);
}

/**
 * Immutable decimal `units / 10^scale`. Addition, subtraction and
 * multiplication are exact; only `round` loses digits.
 */
export class Decimal {
  static readonly ZERO = new Decimal(0n, 0);

  readonly units: bigint;
  readonly scale: number;

  private constructor(units: bigint, scale: number) {
    this.units = units;
    this.scale = scale;
  }

  /**
   * Parse a number or decimal string. Numbers go through their shortest
   * round-trip text, so `0.1` is exactly one tenth.
   */
  static from(value: number | string | Decimal): Decimal {
    if (value instanceof Decimal) {
      return value;
    }
    if (typeof value === 'number' && !Number.isFinite(value)) {
      throw new RangeError(`Not a finite number: ${value}`);
    }

    const text = String(value).trim();
    const match = DECIMAL_PATTERN.exec(text);
    if (!match || (match[2] === '' && (match[3] ?? '') === '')) {
      throw new RangeError(`Not a decimal value: "${text}"`);
    }

    const [, sign, whole, fraction = '', exponentText = '0'] = match;
    const digits = `${whole}${fraction}` || '0';
    let scale = fraction.length - Number(exponentText);
    let units = BigInt(digits);

    if (scale < 0) {
      units *= pow10(-scale);
      scale = 0;
    }

    return new Decimal(sign === '-' ? -units : units, scale);
  }

  private rescale(scale: number): bigint {
    return this.units * pow10(scale - this.scale);
  }

  plus(other: Decimal): Decimal {
    const scale = Math.max(this.scale, other.scale);
    return new Decimal(this.rescale(scale) + other.rescale(scale), scale);
  }

  minus(other: Decimal): Decimal {
    const scale = Math.max(this.scale, other.scale);
    return new Decimal(this.rescale(scale) - other.rescale(scale), scale);
  }

  times(other: Decimal): Decimal {
    return new Decimal(this.units * other.units, this.scale + other.scale);
  }

  /**
   * `this * rate / 100`, exact
   */
  percent(rate: Decimal): Decimal {
    const product = this.times(rate);
    return new Decimal(product.units, product.scale + 2);
  }

  /**
   * Round half away from zero to a number of decimal places
   */
  round(places: number): Decimal {
    if (this.scale <= places) {
      return new Decimal(this.rescale(places), places);
    }

    const divisor = pow10(this.scale - places);
    const magnitude = this.units < 0n ? -this.units : this.units;
    let quotient = magnitude / divisor;
    if ((magnitude % divisor) * 2n >= divisor) {
      quotient += 1n;
    }

    return new Decimal(this.units < 0n ? -quotient : quotient, places);
  }

  isNegative(): boolean {
    return this.units < 0n;
  }

  equals(other: Decimal): boolean {
    const scale = Math.max(this.scale, other.scale);
    return this.rescale(scale) === other.rescale(scale);
  }

  /**
   * Rounded text with exactly `places` decimals, e.g. `141.75`
   */
  toFixed(places: number): string {
    const rounded = this.round(places);
    const negative = rounded.units < 0n;
    const digits = (negative ? -rounded.units : rounded.units).toString().padStart(places + 1, '0');
    const whole = digits.slice(0, digits.length - places);
    const fraction = digits.slice(digits.length - places);
    const sign = negative ? '-' : '';

    return places > 0 ? `${sign}${whole}.${fraction}` : `${sign}${whole}`;
  }

  /**
   * Exact text without trailing zeros past `minPlaces`, e.g. `49.975` or `150.00`
   */
  toExact(minPlaces: number): string {
    let units = this.units;
    let scale = this.scale;
    while (scale > minPlaces && units % 10n === 0n) {
      units /= 10n;
      scale -= 1;
    }
    return new Decimal(units, scale).toFixed(Math.max(scale, minPlaces));
  }

  toString(): string {
    return this.toFixed(this.scale);
  }
}
