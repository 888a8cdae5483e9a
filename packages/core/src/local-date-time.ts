/**
 * Date-time without an offset or zone, as in `2000-01-01T00:00:00`.
 *
 * Cookie timestamps are carried in this form and only pinned to UTC when they
 * are handed to the connector.
 */

const LOCAL_DATE_TIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?$/;

export interface LocalDateTimeFields {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second?: number;
  nano?: number;
}

export class LocalDateTime {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  readonly nano: number;

  private constructor(fields: Required<LocalDateTimeFields>) {
    this.year = fields.year;
    this.month = fields.month;
    this.day = fields.day;
    this.hour = fields.hour;
    this.minute = fields.minute;
    this.second = fields.second;
    this.nano = fields.nano;
    Object.freeze(this);
  }

  /**
   * @throws RangeError if a field is outside its calendar range
   */
  static of(fields: LocalDateTimeFields): LocalDateTime {
    const complete = { ...fields, second: fields.second ?? 0, nano: fields.nano ?? 0 };
    checkRange('year', complete.year, 0, 9999);
    checkRange('month', complete.month, 1, 12);
    checkRange('day', complete.day, 1, daysInMonth(complete.year, complete.month));
    checkRange('hour', complete.hour, 0, 23);
    checkRange('minute', complete.minute, 0, 59);
    checkRange('second', complete.second, 0, 59);
    checkRange('nano', complete.nano, 0, 999_999_999);
    return new LocalDateTime(complete);
  }

  /**
   * Parse `YYYY-MM-DDTHH:mm[:ss[.fffffffff]]`.
   *
   * @throws RangeError if the text is malformed or names a non-existent date
   */
  static parse(text: string): LocalDateTime {
    const match = LOCAL_DATE_TIME_PATTERN.exec(text);
    if (!match) {
      throw new RangeError(`Text cannot be parsed to a LocalDateTime: ${text}`);
    }
    const [, year, month, day, hour, minute, second, fraction] = match;
    return LocalDateTime.of({
      year: Number(year),
      month: Number(month),
      day: Number(day),
      hour: Number(hour),
      minute: Number(minute),
      second: second === undefined ? 0 : Number(second),
      nano: fraction === undefined ? 0 : Number(fraction.padEnd(9, '0')),
    });
  }

  /** The same wall-clock reading taken as UTC. Sub-millisecond digits are dropped. */
  toDate(): Date {
    const date = new Date(0);
    date.setUTCFullYear(this.year, this.month - 1, this.day);
    date.setUTCHours(this.hour, this.minute, this.second, Math.floor(this.nano / 1_000_000));
    return date;
  }

  equals(other: unknown): boolean {
    return other instanceof LocalDateTime && other.toString() === this.toString();
  }

  /**
   * ISO local date-time text. Seconds are always written; the fraction only
   * when non-zero, without trailing zeros.
   */
  toString(): string {
    const date = `${pad(this.year, 4)}-${pad(this.month, 2)}-${pad(this.day, 2)}`;
    let time = `${pad(this.hour, 2)}:${pad(this.minute, 2)}:${pad(this.second, 2)}`;
    if (this.nano !== 0) {
      time += `.${pad(this.nano, 9).replace(/0+$/, '')}`;
    }
    return `${date}T${time}`;
  }

  toJSON(): string {
    return this.toString();
  }
}

function pad(value: number, width: number): string {
  return value.toString().padStart(width, '0');
}

function checkRange(field: string, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new RangeError(`LocalDateTime ${field} must be between ${min} and ${max}: ${value}`);
  }
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
    return leap ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}
