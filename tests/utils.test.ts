import assert from "node:assert/strict";
import { test } from "node:test";

import { calendarDate, formatDayLabel, formatIsoDay, isSameDay, parseDayMonthYear, todayIn } from "../lib/utils.ts";

test("parseDayMonthYear reads exchange expiry strings", () => {
    const parsed = parseDayMonthYear("25-JUN-2025");
    assert.ok(parsed);
    assert.equal(formatIsoDay(parsed), "2025-06-25");
    assert.equal(parsed.valueOf(), Date.parse("2025-06-24T18:30:00Z"));
});

test("parseDayMonthYear ignores month case and accepts single digit days", () => {
    const parsed = parseDayMonthYear("5-jul-2025");
    assert.ok(parsed);
    assert.equal(formatIsoDay(parsed), "2025-07-05");
});

test("parseDayMonthYear supports the compact scrip master form", () => {
    const parsed = parseDayMonthYear("26JUN2025", "Asia/Kolkata", "");
    assert.ok(parsed);
    assert.equal(formatIsoDay(parsed), "2025-06-26");
    assert.equal(parseDayMonthYear("26-JUN-2025", "Asia/Kolkata", ""), null);
});

test("parseDayMonthYear rejects values that are not calendar days", () => {
    assert.equal(parseDayMonthYear("N/A"), null);
    assert.equal(parseDayMonthYear(""), null);
    assert.equal(parseDayMonthYear("31-FEB-2025"), null);
    assert.equal(parseDayMonthYear("10-JLY-2025"), null);
    assert.equal(parseDayMonthYear("2025-07-10"), null);
});

test("calendarDate handles leap days", () => {
    assert.ok(calendarDate(2024, 2, 29));
    assert.equal(calendarDate(2025, 2, 29), null);
    assert.equal(calendarDate(2025, 13, 1), null);
});

test("todayIn normalizes the wall clock to midnight in the market timezone", () => {
    const today = todayIn("Asia/Kolkata", new Date("2025-07-09T19:00:00Z"));
    assert.equal(formatIsoDay(today), "2025-07-10");
    assert.equal(today.valueOf(), Date.parse("2025-07-09T18:30:00Z"));
});

test("formatDayLabel uppercases the month abbreviation", () => {
    const date = calendarDate(2025, 7, 10);
    assert.ok(date);
    assert.equal(formatDayLabel(date), "10-JUL-2025");
});

test("isSameDay compares normalized instants", () => {
    const a = parseDayMonthYear("10-JUL-2025");
    const b = calendarDate(2025, 7, 10);
    const c = calendarDate(2025, 7, 11);
    assert.ok(a && b && c);
    assert.equal(isSameDay(a, b), true);
    assert.equal(isSameDay(a, c), false);
});
