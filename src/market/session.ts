import { PromptVariant, SessionInfo, SessionPhase } from '../core/types';
import { addDays, clockToMinutes, isWeekend, zonedParts } from '../core/time';

// Exchange clock. The afternoon window runs to 15:05 to cover the closing call auction.
export const MORNING_OPEN = clockToMinutes('09:15');
const MORNING_CLOSE = clockToMinutes('11:30');
const AFTERNOON_OPEN = clockToMinutes('13:00');
const AFTERNOON_CLOSE = clockToMinutes('15:05');
// Continuous trading ends here; a snapshot taken after it carries the day's close.
export const CLOSING_BELL = clockToMinutes('15:00');

// Bounds the calendar walk; the longest exchange closure is well under this.
const MAX_CALENDAR_SCAN_DAYS = 60;

export interface SessionCalendarOptions {
  timezone: string;
  holidays: Iterable<string>;
}

const phaseForMinute = (minute: number): SessionPhase => {
  if (minute < MORNING_OPEN) return 'pre_open';
  if (minute < MORNING_CLOSE) return 'intraday';
  if (minute < AFTERNOON_OPEN) return 'noon_break';
  if (minute < AFTERNOON_CLOSE) return 'intraday';
  return 'post_close';
};

// The live intraday variant is deliberately absent.
const variantForPhase = (phase: SessionPhase): PromptVariant | null => {
  switch (phase) {
    case 'noon_break':
      return 'noon_review';
    case 'pre_open':
    case 'post_close':
      return 'premarket';
    default:
      return null;
  }
};

export class SessionClassifier {
  readonly timezone: string;
  private holidays: Set<string>;

  constructor(options: SessionCalendarOptions) {
    this.timezone = options.timezone;
    this.holidays = new Set(options.holidays);
  }

  isTradingDay(isoDate: string): boolean {
    return !isWeekend(isoDate) && !this.holidays.has(isoDate);
  }

  /** First trading date strictly after `isoDate`. */
  nextTradableDate(isoDate: string): string {
    return this.walk(isoDate, 1);
  }

  /** Last trading date strictly before `isoDate`. */
  previousTradableDate(isoDate: string): string {
    return this.walk(isoDate, -1);
  }

  tradingDaysBetween(from: string, to: string): string[] {
    const days: string[] = [];
    let cursor = this.isTradingDay(from) ? from : this.nextTradableDate(from);
    while (cursor <= to) {
      days.push(cursor);
      cursor = this.nextTradableDate(cursor);
    }
    return days;
  }

  classify(now: Date): SessionInfo {
    const local = zonedParts(now, this.timezone);
    const tradingDay = this.isTradingDay(local.date);
    // weekends and holidays anchor like an evening session: last close, next open
    const phase = tradingDay ? phaseForMinute(local.minuteOfDay) : 'post_close';
    const nextTradableDate = this.nextTradableDate(local.date);
    return {
      phase,
      timezone: this.timezone,
      tradingDay,
      localDate: local.date,
      localTime: local.time,
      targetDate: tradingDay && phase !== 'post_close' ? local.date : nextTradableDate,
      nextTradableDate,
      previousTradableDate: this.previousTradableDate(local.date),
      promptVariant: variantForPhase(phase)
    };
  }

  private walk(isoDate: string, step: 1 | -1): string {
    let cursor = isoDate;
    for (let i = 0; i < MAX_CALENDAR_SCAN_DAYS; i++) {
      cursor = addDays(cursor, step);
      if (this.isTradingDay(cursor)) return cursor;
    }
    throw new Error(`No trading day within ${MAX_CALENDAR_SCAN_DAYS} days of ${isoDate}; check the holiday calendar`);
  }
}
