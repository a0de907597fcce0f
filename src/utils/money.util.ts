import { ValidationError } from "./error";

/**
 * Currency utility: RUB helper.
 * Strict conversion between roubles (decimal string/number) and kopecks (bigint).
 */
export class Money {
  private static readonly MAJOR_PATTERN = /^-?\d+(\.\d{1,2})?$/;

  static assertMajorInput(value: unknown, fieldName = "amount"): void {
    if (value === null || value === undefined) {
      throw new ValidationError(`Invalid ${fieldName}: value is required`);
    }
    if (typeof value === "number") {
      if (!Number.isFinite(value)) {
        throw new ValidationError(`Invalid ${fieldName}: must be a finite number`);
      }
      if (!Money.MAJOR_PATTERN.test(value.toString())) {
        throw new ValidationError(
          `Invalid ${fieldName}: must be roubles with max 2 decimals`
        );
      }
      return;
    }
    if (typeof value === "string") {
      if (!Money.MAJOR_PATTERN.test(value.trim())) {
        throw new ValidationError(
          `Invalid ${fieldName}: must be roubles with max 2 decimals`
        );
      }
      return;
    }
    throw new ValidationError(`Invalid ${fieldName}: unsupported type`);
  }

  /**
   * Roubles to kopecks.
   * @param major "100.50", "10", 100.5
   * @returns 10050n
   */
  static toMinor(major: string | number, fieldName = "amount"): bigint {
    Money.assertMajorInput(major, fieldName);
    const str = major.toString().trim();
    const sign = str.startsWith("-") ? -1n : 1n;
    const normalized = sign === -1n ? str.slice(1) : str;
    const [intPart, fracPart] = normalized.split(".");

    const integral = BigInt(intPart || "0");
    const fractional = fracPart ? BigInt(fracPart.padEnd(2, "0")) : 0n;

    return sign * (integral * 100n + fractional);
  }

  /**
   * Kopecks to roubles.
   * @param minor 10050n
   * @returns "100.50"
   */
  static toMajor(minor: bigint): string {
    const sign = minor < 0n ? "-" : "";
    const abs = minor < 0n ? -minor : minor;
    const integral = abs / 100n;
    const fractional = abs % 100n;
    return `${sign}${integral.toString()}.${fractional.toString().padStart(2, "0")}`;
  }

  static toNumber(minor: bigint): number {
    return Number(Money.toMajor(minor));
  }

  /**
   * Rounds a float amount of roubles to kopecks, half away from zero.
   * Goes through the decimal string so 1.005 rounds the way it reads.
   */
  static roundToMinor(major: number): bigint {
    if (!Number.isFinite(major)) {
      throw new ValidationError("Cannot round a non-finite amount");
    }
    const negative = major < 0;
    const abs = Math.abs(major);
    const scaled = Math.round(Number(`${abs.toFixed(10)}e2`));
    const minor = BigInt(scaled);
    return negative ? -minor : minor;
  }

  /** round2 in major units, half away from zero. */
  static round2(major: number): number {
    return Money.toNumber(Money.roundToMinor(major));
  }

  /** amount × fraction in kopecks, half away from zero. */
  static percentOf(minor: bigint, fraction: number): bigint {
    return Money.roundToMinor(Money.toNumber(minor) * fraction);
  }

  static max(a: bigint, b: bigint): bigint {
    return a > b ? a : b;
  }

  static min(a: bigint, b: bigint): bigint {
    return a < b ? a : b;
  }
}
