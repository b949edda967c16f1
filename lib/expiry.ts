import type { Dayjs } from "dayjs";
import type { IndexConfig } from "./config.ts";
import { withoutIndexArtifacts } from "./symbolMaster.ts";
import type { InstrumentRow, InstrumentTable } from "./symbolMaster.ts";
import { MARKET_TIMEZONE, isSameDay, parseDayMonthYear } from "./utils.ts";

export type DatedInstrumentRow = {
    row: InstrumentRow;
    expiry: Dayjs;
};

export type ExpirySelection = {
    index: IndexConfig;
    expiryDate: Dayjs;
    columns: string[];
    rows: InstrumentRow[];
    /** Matching rows whose Expiry could not be parsed. */
    droppedRows: number;
};

export type NotFoundReason = "no-matching-rows" | "no-upcoming-expiry";

export type ExpiryResolution =
    | ({ status: "resolved" } & ExpirySelection)
    | { status: "not-found"; index: IndexConfig; reason: NotFoundReason; droppedRows: number };

export const filterIndexRows = (rows: InstrumentRow[], index: Pick<IndexConfig, "symbol" | "instrument">) =>
    rows.filter((row) => row.Symbol === index.symbol && row.Instrument === index.instrument);

/**
 * Splits rows into those with a parsable `DD-MMM-YYYY` expiry (localized to
 * midnight in `timezone`) and a count of the ones that were dropped.
 */
export const parseExpiries = (rows: InstrumentRow[], timezone: string = MARKET_TIMEZONE) => {
    const parsed: DatedInstrumentRow[] = [];
    let dropped = 0;
    for (const row of rows) {
        const expiry = parseDayMonthYear(row.Expiry, timezone);
        if (expiry) {
            parsed.push({ row, expiry });
        } else {
            dropped++;
        }
    }
    return { parsed, dropped };
}

const projectRow = (row: InstrumentRow, columns: string[]): InstrumentRow => {
    const projected: InstrumentRow = { Symbol: row.Symbol, Instrument: row.Instrument, Expiry: row.Expiry };
    for (const column of columns) {
        projected[column] = row[column] ?? "";
    }
    return projected;
}

export const resolveExpiry = (
    table: Pick<InstrumentTable, "columns" | "rows">,
    index: IndexConfig,
    referenceDate: Dayjs,
    timezone: string = MARKET_TIMEZONE,
): ExpiryResolution => {
    const candidates = filterIndexRows(table.rows, index);
    if (candidates.length == 0) {
        return { status: "not-found", index, reason: "no-matching-rows", droppedRows: 0 };
    }

    const { parsed, dropped } = parseExpiries(candidates, timezone);

    //WEEKLY and MONTHLY cadences both roll to the nearest expiry on or after the reference date
    const upcoming = parsed.filter(({ expiry }) => expiry.valueOf() >= referenceDate.valueOf());
    if (upcoming.length == 0) {
        return { status: "not-found", index, reason: "no-upcoming-expiry", droppedRows: dropped };
    }

    const expiryDate = upcoming
        .map(({ expiry }) => expiry)
        .reduce((nearest, expiry) => expiry.valueOf() < nearest.valueOf() ? expiry : nearest);

    const columns = withoutIndexArtifacts(table.columns);
    const rows = parsed
        .filter(({ expiry }) => isSameDay(expiry, expiryDate))
        .map(({ row }) => projectRow(row, columns));

    return { status: "resolved", index, expiryDate, columns, rows, droppedRows: dropped };
}

/** Same-day policy: only today's expiries ship, unless the operator forces every resolved one. */
export const isIncludedInBundle = (selection: Pick<ExpirySelection, "expiryDate">, referenceDate: Dayjs, forceExpiryToday: boolean) =>
    forceExpiryToday || isSameDay(selection.expiryDate, referenceDate);
