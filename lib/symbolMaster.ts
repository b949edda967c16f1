import JSZip from "jszip";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import type { KyInstance } from "ky";
import type { Exchange } from "./config.ts";

export const REQUIRED_COLUMNS = ["Symbol", "Instrument", "Expiry"] as const;

//only the matching columns are trimmed, the rest pass through as written
export const InstrumentRowSchema = z.object({
    Symbol: z.string().trim().default(""),
    Instrument: z.string().trim().default(""),
    Expiry: z.string().trim().default(""),
}).catchall(z.string());
export type InstrumentRow = z.infer<typeof InstrumentRowSchema>;

export type InstrumentTable = {
    exchange: Exchange;
    /** Header order of the source file. Blank headers are named `Unnamed: <position>`. */
    columns: string[];
    rows: InstrumentRow[];
};

const UNNAMED_COLUMN = /^Unnamed/;

export const isIndexArtifactColumn = (column: string) => UNNAMED_COLUMN.test(column);

export const withoutIndexArtifacts = (columns: string[]) => columns.filter((column) => !isIndexArtifactColumn(column));

//the masters end every line with a dangling delimiter
export const stripTrailingDelimiters = (text: string) =>
    text.split(/\r?\n/).map((line) => line.replace(/,+$/, "")).join("\n");

export const parseSymbolMaster = (text: string): Pick<InstrumentTable, "columns" | "rows"> => {
    let columns: string[] = [];
    const records: unknown = parse(stripTrailingDelimiters(text), {
        bom: true,
        skip_empty_lines: true,
        relax_column_count: true,
        columns: (header: string[]) => {
            columns = header.map((name, position) => name.trim() || `Unnamed: ${position}`);
            return columns;
        },
    });

    const missing = REQUIRED_COLUMNS.filter((column) => !columns.includes(column));
    if (missing.length > 0) {
        throw new Error(`Symbol master is missing required columns: ${missing.join(", ")}`);
    }

    return { columns, rows: z.array(InstrumentRowSchema).parse(records) };
}

export const readSymbolMasterArchive = async (archive: ArrayBuffer) => {
    const zip = await JSZip.loadAsync(archive);
    const [entry] = Object.values(zip.files).filter((file) => !file.dir);
    if (!entry) {
        throw new Error(`Symbol master archive has no files`);
    }
    return parseSymbolMaster(await entry.async("string"));
}

export const downloadSymbolMaster = async (http: KyInstance, exchange: Exchange, url: string): Promise<InstrumentTable> => {
    const archive = await http.get(url).arrayBuffer();
    const { columns, rows } = await readSymbolMasterArchive(archive);
    return { exchange, columns, rows };
}
