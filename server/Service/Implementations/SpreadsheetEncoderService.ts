import * as XLSX from "xlsx";
import type { Table } from "@shared/schema";
import type { ISpreadsheetEncoderService } from "../Abstractions/ISpreadsheetEncoderService";

export class SpreadsheetEncoderService implements ISpreadsheetEncoderService {
    // Header row of column names, then one row per table row; null cells are left empty
    encode(table: Table, sheetName: string = "Sheet1"): Buffer {
        const worksheet = XLSX.utils.aoa_to_sheet([[...table.columns], ...table.rows.map((row) => [...row])]);
        const workbook = XLSX.utils.book_new();
        XLSX.utils.book_append_sheet(workbook, worksheet, sheetName);

        const buffer: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
        return buffer;
    }
}
