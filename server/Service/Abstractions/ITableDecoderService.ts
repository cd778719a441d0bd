import type { Table } from "@shared/schema";

export interface ITableDecoderService {
    // Throws DecodeError when no candidate encoding yields a delimited table
    decode(bytes: Uint8Array, label: string): Table;
}
