/** A calendar date without a time component, formatted `YYYY-MM-DD`. */
export type CalendarDate = string;

export interface DateRange {
  start: CalendarDate;
  end: CalendarDate;
}

export interface YearMonth {
  year: number;
  month: number;
}

const CALENDAR_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const WEEKDAY_LABELS = ["Mon", "Tue", "Wed", "Thu", "Fri", "Sat", "Sun"] as const;
const MONTH_NAMES = [
  "January", "February", "March", "April", "May", "June",
  "July", "August", "September", "October", "November", "December",
] as const;
const MS_PER_DAY = 86_400_000;

export class InvalidDateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidDateError";
  }
}

function toUtc(date: CalendarDate): Date {
  const match = CALENDAR_DATE_PATTERN.exec(date);
  if (!match) {
    throw new InvalidDateError(`Invalid date format (YYYY-MM-DD): ${date}`);
  }
  const [, y, m, d] = match;
  const utc = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  if (formatUtc(utc) !== date) {
    throw new InvalidDateError(`Invalid calendar date: ${date}`);
  }
  return utc;
}

function formatUtc(date: Date): CalendarDate {
  const year = String(date.getUTCFullYear()).padStart(4, "0");
  const month = String(date.getUTCMonth() + 1).padStart(2, "0");
  const day = String(date.getUTCDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

export function isCalendarDate(value: string): boolean {
  try {
    toUtc(value);
    return true;
  } catch {
    return false;
  }
}

export function compareDates(a: CalendarDate, b: CalendarDate): number {
  return toUtc(a).getTime() - toUtc(b).getTime();
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  return formatUtc(new Date(toUtc(date).getTime() + days * MS_PER_DAY));
}

export function daysBetween(start: CalendarDate, end: CalendarDate): number {
  return Math.round((toUtc(end).getTime() - toUtc(start).getTime()) / MS_PER_DAY);
}

/** Every date from start to end, both included. */
export function eachDay(range: DateRange): CalendarDate[] {
  const length = daysBetween(range.start, range.end) + 1;
  if (length < 1) {
    throw new InvalidDateError(`Start date ${range.start} is after end date ${range.end}`);
  }
  const days: CalendarDate[] = [];
  for (let i = 0; i < length; i++) {
    days.push(addDays(range.start, i));
  }
  return days;
}

export function isWithin(date: CalendarDate, range: DateRange): boolean {
  return compareDates(date, range.start) >= 0 && compareDates(date, range.end) <= 0;
}

/** 0 = Monday ... 6 = Sunday */
export function weekdayIndex(date: CalendarDate): number {
  return (toUtc(date).getUTCDay() + 6) % 7;
}

export function weekdayLabel(date: CalendarDate): string {
  return WEEKDAY_LABELS[weekdayIndex(date)];
}

export function dayOfMonth(date: CalendarDate): number {
  return toUtc(date).getUTCDate();
}

/** Monday to Sunday week that contains the reference date. */
export function weekContaining(reference: CalendarDate): DateRange {
  const start = addDays(reference, -weekdayIndex(reference));
  return { start, end: addDays(start, 6) };
}

export function assertYearMonth({ year, month }: YearMonth): void {
  if (!Number.isInteger(year) || year < 1970 || year > 9999) {
    throw new InvalidDateError(`Invalid year: ${year}`);
  }
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new InvalidDateError(`Invalid month: ${month}`);
  }
}

export function monthRange(ym: YearMonth): DateRange {
  assertYearMonth(ym);
  const first = new Date(Date.UTC(ym.year, ym.month - 1, 1));
  const last = new Date(Date.UTC(ym.year, ym.month, 0));
  return { start: formatUtc(first), end: formatUtc(last) };
}

export function shiftMonth({ year, month }: YearMonth, delta: number): YearMonth {
  const index = year * 12 + (month - 1) + delta;
  return { year: Math.floor(index / 12), month: (index % 12) + 1 };
}

export function yearMonthOf(date: CalendarDate): YearMonth {
  const utc = toUtc(date);
  return { year: utc.getUTCFullYear(), month: utc.getUTCMonth() + 1 };
}

export function monthName(month: number): string {
  const name = MONTH_NAMES[month - 1];
  if (!name) {
    throw new InvalidDateError(`Invalid month: ${month}`);
  }
  return name;
}

const zoneFormatters = new Map<string, Intl.DateTimeFormat>();

function zoneFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = zoneFormatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
    });
    zoneFormatters.set(timeZone, formatter);
  }
  return formatter;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    zoneFormatter(timeZone);
    return true;
  } catch {
    return false;
  }
}

/** Calendar date of an instant as seen by a wall clock in `timeZone`. */
export function calendarDateInZone(instant: Date, timeZone: string): CalendarDate {
  const parts = zoneFormatter(timeZone).formatToParts(instant);
  const part = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? "";
  return `${part("year").padStart(4, "0")}-${part("month")}-${part("day")}`;
}
