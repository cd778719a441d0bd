import type { Table } from "@shared/schema";

export interface ISpreadsheetEncoderService {
    encode(table: Table, sheetName?: string): Buffer;
}
