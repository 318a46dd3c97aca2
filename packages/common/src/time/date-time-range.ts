import { Duration, Either, Option, Order, Schema } from 'effect'
import { InvalidRangeError } from '../errors/index.js'
import { Json } from '../json/codec.js'

const latest = (a: Date, b: Date): Date => (a.getTime() > b.getTime() ? a : b)
const earliest = (a: Date, b: Date): Date => (a.getTime() < b.getTime() ? a : b)

/**
 * Closed interval between two instants with `start <= end`. Construction
 * with `start > end` fails with a `ParseError`; `fromDates` returns an `Either`.
 */
export class DateTimeRange extends Schema.Class<DateTimeRange>('DateTimeRange')(
  Schema.Struct({
    start: Schema.Date,
    end: Schema.Date,
  }).pipe(
    Schema.filter(({ start, end }) =>
      start.getTime() <= end.getTime() ? undefined : 'The start of the range must not be after its end',
    ),
  ),
) {
  static fromDates(start: Date, end: Date): Either.Either<DateTimeRange, InvalidRangeError> {
    if (start.getTime() > end.getTime()) {
      return Either.left(
        new InvalidRangeError({ message: 'The start of the range must be less than or equal to the end of the range' }),
      )
    }
    return Either.right(new DateTimeRange({ start, end }))
  }

  /** From local midnight today to local midnight tomorrow */
  static today(now: Date = new Date()): DateTimeRange {
    const start = new Date(now.getFullYear(), now.getMonth(), now.getDate())
    const end = new Date(now.getFullYear(), now.getMonth(), now.getDate() + 1)
    return new DateTimeRange({ start, end })
  }

  /** Orders ranges by their duration */
  static readonly Order: Order.Order<DateTimeRange> = Order.mapInput(
    Duration.Order,
    (range: DateTimeRange) => range.duration,
  )

  get duration(): Duration.Duration {
    return Duration.millis(this.end.getTime() - this.start.getTime())
  }

  get middle(): Date {
    return new Date(this.start.getTime() + (this.end.getTime() - this.start.getTime()) / 2)
  }

  get isTimePoint(): boolean {
    return this.start.getTime() === this.end.getTime()
  }

  /** Moves both bounds by the same amount. A plain number is milliseconds and may be negative. */
  shift(by: Duration.DurationInput | number): DateTimeRange {
    const millis = typeof by === 'number' ? by : Duration.toMillis(by)
    return new DateTimeRange({
      start: new Date(this.start.getTime() + millis),
      end: new Date(this.end.getTime() + millis),
    })
  }

  /**
   * True when the ranges share a non-empty stretch of time at least
   * `minimumOverlap` long. Ranges that merely touch do not overlap.
   */
  overlaps(other: DateTimeRange, minimumOverlap: Duration.DurationInput = Duration.zero): boolean {
    const overlapStart = latest(this.start, other.start).getTime()
    const overlapEnd = earliest(this.end, other.end).getTime()
    return overlapStart < overlapEnd && overlapEnd - overlapStart >= Duration.toMillis(minimumOverlap)
  }

  contains(value: Date | DateTimeRange): boolean {
    if (value instanceof DateTimeRange) {
      return this.start.getTime() <= value.start.getTime() && this.end.getTime() >= value.end.getTime()
    }
    return this.start.getTime() <= value.getTime() && this.end.getTime() >= value.getTime()
  }

  intersection(
    other: DateTimeRange,
    minimumOverlap: Duration.DurationInput = Duration.zero,
  ): Option.Option<DateTimeRange> {
    if (!this.overlaps(other, minimumOverlap)) {
      return Option.none()
    }
    return Option.some(
      new DateTimeRange({ start: latest(this.start, other.start), end: earliest(this.end, other.end) }),
    )
  }

  equals(that: DateTimeRange): boolean {
    return this.start.getTime() === that.start.getTime() && this.end.getTime() === that.end.getTime()
  }

  toString(): string {
    return `${this.start.toISOString()} - ${this.end.toISOString()}`
  }
}

/** `{"start": <ISO 8601>, "end": <ISO 8601>}` */
export const DateTimeRangeJson = Json.fromSchema(DateTimeRange, 'DateTimeRange')
