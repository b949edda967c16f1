import JSZip from "jszip";
import { stringify } from "csv-stringify/sync";
import type { Dayjs } from "dayjs";
import type { ExpirySelection } from "./expiry.ts";
import { formatDayLabel } from "./utils.ts";

export type ExportFile = {
    fileName: string;
    content: string;
};

export const buildExportFileName = (indexName: string, expiryDate: Dayjs) =>
    `${indexName.toLowerCase()}_${formatDayLabel(expiryDate)}.txt`;

export const buildBundleName = (referenceDate: Dayjs) => `EXPIRY_SYMBOLS_${formatDayLabel(referenceDate)}.zip`;

export const toCsv = (rows: Record<string, string>[], columns: string[]) =>
    stringify(rows, { header: true, columns });

export const buildExpiryExport = ({ index, expiryDate, rows, columns }: ExpirySelection): ExportFile => ({
    fileName: buildExportFileName(index.name, expiryDate),
    content: toCsv(rows, columns),
});

export const createArchive = async (files: ExportFile[]): Promise<ArrayBuffer> => {
    const zip = new JSZip();
    for (const { fileName, content } of files) {
        zip.file(fileName, content);
    }
    return await zip.generateAsync({ type: "arraybuffer", compression: "DEFLATE" });
}
