/**
 * Duration value
 *
 * An amount of time held as whole seconds plus a nanosecond adjustment in
 * [0, 999_999_999]. Text form is ISO-8601 `PnDTnHnMn.nS`; the normalized output
 * carries hours, minutes and seconds only (`PT8H`, `PT1M30S`, `PT0.003S`).
 */

const NANOS_PER_SECOND = 1_000_000_000n;
const NANOS_PER_MILLI = 1_000_000n;
const SECONDS_PER_MINUTE = 60n;
const SECONDS_PER_HOUR = 3_600n;
const SECONDS_PER_DAY = 86_400n;
// signed 64-bit second count
const MAX_SECONDS = 2n ** 63n - 1n;
const MIN_SECONDS = -(2n ** 63n);

const DURATION_PATTERN =
  /^([-+]?)P(?:([-+]?[0-9]+)D)?(T(?:([-+]?[0-9]+)H)?(?:([-+]?[0-9]+)M)?(?:([-+]?[0-9]+)(?:[.,]([0-9]{0,9}))?S)?)?$/i;

export class Duration {
  static readonly ZERO = new Duration(0n);

  private readonly totalNanos: bigint;

  private constructor(totalNanos: bigint) {
    this.totalNanos = totalNanos;
    Object.freeze(this);
  }

  static ofMillis(millis: number): Duration {
    if (!Number.isSafeInteger(millis)) {
      throw new RangeError(`Duration millis must be a safe integer: ${millis}`);
    }
    return Duration.checked(BigInt(millis) * NANOS_PER_MILLI, `${millis}ms`);
  }

  static ofSeconds(seconds: number, nanoAdjustment = 0): Duration {
    if (!Number.isSafeInteger(seconds) || !Number.isSafeInteger(nanoAdjustment)) {
      throw new RangeError(`Duration parts must be safe integers: ${seconds}, ${nanoAdjustment}`);
    }
    return Duration.checked(BigInt(seconds) * NANOS_PER_SECOND + BigInt(nanoAdjustment), `${seconds}s`);
  }

  /**
   * Parse ISO-8601 duration text such as `PT30S`, `PT0.003S`, `P1DT2H` or `-PT5S`.
   *
   * @throws RangeError if the text is not a duration or its seconds overflow 64 bits
   */
  static parse(text: string): Duration {
    const match = DURATION_PATTERN.exec(text);
    // `T` must be followed by at least one component, and `P` alone is empty
    if (!match || match[3] === 'T' || match[3] === 't' || (match[2] === undefined && match[3] === undefined)) {
      throw new RangeError(`Text cannot be parsed to a Duration: ${text}`);
    }

    const [, sign, days, , hours, minutes, seconds, fraction] = match;
    let total = 0n;
    total += component(days) * SECONDS_PER_DAY * NANOS_PER_SECOND;
    total += component(hours) * SECONDS_PER_HOUR * NANOS_PER_SECOND;
    total += component(minutes) * SECONDS_PER_MINUTE * NANOS_PER_SECOND;
    total += component(seconds) * NANOS_PER_SECOND;

    if (fraction !== undefined && fraction !== '') {
      const nanos = BigInt(fraction.padEnd(9, '0'));
      // the fraction carries the sign of the seconds it belongs to
      total += seconds !== undefined && seconds.startsWith('-') ? -nanos : nanos;
    }

    return Duration.checked(sign === '-' ? -total : total, text);
  }

  private static checked(totalNanos: bigint, source: string): Duration {
    const seconds = floorDiv(totalNanos, NANOS_PER_SECOND);
    if (seconds > MAX_SECONDS || seconds < MIN_SECONDS) {
      throw new RangeError(`Duration exceeds the 64-bit seconds range: ${source}`);
    }
    return new Duration(totalNanos);
  }

  /** Whole seconds, floored, so `nanos` is always non-negative */
  get seconds(): number {
    return Number(floorDiv(this.totalNanos, NANOS_PER_SECOND));
  }

  get nanos(): number {
    return Number(this.totalNanos - floorDiv(this.totalNanos, NANOS_PER_SECOND) * NANOS_PER_SECOND);
  }

  /** Total length in milliseconds, truncated toward zero */
  toMillis(): number {
    return Number(this.totalNanos / NANOS_PER_MILLI);
  }

  isZero(): boolean {
    return this.totalNanos === 0n;
  }

  isNegative(): boolean {
    return this.totalNanos < 0n;
  }

  compareTo(other: Duration): number {
    return this.totalNanos === other.totalNanos ? 0 : this.totalNanos < other.totalNanos ? -1 : 1;
  }

  equals(other: unknown): boolean {
    return other instanceof Duration && other.totalNanos === this.totalNanos;
  }

  /**
   * Normalized ISO-8601 text. Negative durations are written with a leading
   * sign (`-PT5S`), which {@link Duration.parse} reads back.
   */
  toString(): string {
    if (this.totalNanos === 0n) {
      return 'PT0S';
    }
    if (this.totalNanos < 0n) {
      return `-${new Duration(-this.totalNanos).toString()}`;
    }

    const totalSeconds = this.totalNanos / NANOS_PER_SECOND;
    const nanos = this.totalNanos % NANOS_PER_SECOND;
    const hours = totalSeconds / SECONDS_PER_HOUR;
    const minutes = (totalSeconds % SECONDS_PER_HOUR) / SECONDS_PER_MINUTE;
    const seconds = totalSeconds % SECONDS_PER_MINUTE;

    let text = 'PT';
    if (hours !== 0n) text += `${hours}H`;
    if (minutes !== 0n) text += `${minutes}M`;
    if (seconds === 0n && nanos === 0n) {
      return text;
    }
    text += seconds.toString();
    if (nanos !== 0n) {
      text += `.${nanos.toString().padStart(9, '0').replace(/0+$/, '')}`;
    }
    return `${text}S`;
  }

  toJSON(): string {
    return this.toString();
  }
}

function component(value: string | undefined): bigint {
  return value === undefined ? 0n : BigInt(value);
}

function floorDiv(a: bigint, b: bigint): bigint {
  const q = a / b;
  return a % b !== 0n && a < 0n !== b < 0n ? q - 1n : q;
}
