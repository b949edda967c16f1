import dayjs from "dayjs";
import utc from "dayjs/plugin/utc.js";
import timezone from "dayjs/plugin/timezone.js";
import type { Dayjs } from "dayjs";

dayjs.extend(utc);
dayjs.extend(timezone);

export const MARKET_TIMEZONE = "Asia/Kolkata";

const MONTHS = ["JAN", "FEB", "MAR", "APR", "MAY", "JUN", "JUL", "AUG", "SEP", "OCT", "NOV", "DEC"];

const pad = (value: number) => String(value).padStart(2, "0");

const daysInMonth = (month: number, year: number) => new Date(Date.UTC(year, month, 0)).getUTCDate();

/**
 * Midnight of the given calendar day in `tz`, or null when the day does not exist.
 * `month` is 1-based.
 */
export const calendarDate = (year: number, month: number, day: number, tz: string = MARKET_TIMEZONE): Dayjs | null => {
    if (month < 1 || month > 12 || day < 1 || day > daysInMonth(month, year)) return null;
    return dayjs.tz(`${year}-${pad(month)}-${pad(day)}`, tz);
}

/**
 * Parses `25-JUN-2025` style dates (or `25JUN2025` with an empty separator).
 * Month abbreviations match regardless of case.
 */
export const parseDayMonthYear = (value: string, tz: string = MARKET_TIMEZONE, separator = "-"): Dayjs | null => {
    const rxMatch = new RegExp(`^(\\d{1,2})${separator}([A-Za-z]{3})${separator}(\\d{4})$`).exec(value);
    if (!rxMatch) return null;
    const month = MONTHS.indexOf(rxMatch[2].toUpperCase()) + 1;
    if (month == 0) return null;
    return calendarDate(Number(rxMatch[3]), month, Number(rxMatch[1]), tz);
}

export const parseIsoDay = (value: string, tz: string = MARKET_TIMEZONE): Dayjs | null => {
    const rxMatch = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
    return rxMatch ? calendarDate(Number(rxMatch[1]), Number(rxMatch[2]), Number(rxMatch[3]), tz) : null;
}

export const todayIn = (tz: string = MARKET_TIMEZONE, now: Date = new Date()): Dayjs => {
    return dayjs.tz(dayjs(now).tz(tz).format("YYYY-MM-DD"), tz);
}

export const isSameDay = (a: Dayjs, b: Dayjs) => a.valueOf() == b.valueOf();

//e.g. 10-JUL-2025
export const formatDayLabel = (date: Dayjs) => date.format("DD-MMM-YYYY").toUpperCase();

export const formatIsoDay = (date: Dayjs) => date.format("YYYY-MM-DD");
