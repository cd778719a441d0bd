import Papa, { type ParseError } from "papaparse";
import type { Cell, Table } from "@shared/schema";
import { DecodeError } from "../../errors";
import { log } from "../../log";
import type { ITableDecoderService } from "../Abstractions/ITableDecoderService";

export interface EncodingCandidate {
    name: string;
    decode(bytes: Uint8Array): string;
}

// Field values read as missing
const NA_VALUES = new Set([
    "",
    "#N/A",
    "#N/A N/A",
    "#NA",
    "-1.#IND",
    "-1.#QNAN",
    "-NaN",
    "-nan",
    "1.#IND",
    "1.#QNAN",
    "<NA>",
    "N/A",
    "NA",
    "NULL",
    "NaN",
    "None",
    "n/a",
    "nan",
    "null",
]);

export const ENCODING_CANDIDATES: readonly EncodingCandidate[] = [
    {
        name: "utf-8",
        decode: (bytes) => {
            if (bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf) {
                throw new Error("starts with a UTF-8 byte order mark");
            }
            return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
        },
    },
    {
        name: "utf-8-sig",
        decode: (bytes) => new TextDecoder("utf-8", { fatal: true }).decode(bytes),
    },
    {
        name: "utf-16",
        decode: (bytes) => {
            if (bytes[0] === 0xff && bytes[1] === 0xfe) {
                return new TextDecoder("utf-16le", { fatal: true }).decode(bytes);
            }
            if (bytes[0] === 0xfe && bytes[1] === 0xff) {
                return new TextDecoder("utf-16be", { fatal: true }).decode(bytes);
            }
            throw new Error("no UTF-16 byte order mark");
        },
    },
    {
        name: "latin1",
        decode: (bytes) => Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("latin1"),
    },
];

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function toCell(field: string | undefined): Cell {
    if (field === undefined || NA_VALUES.has(field)) return null;
    return field;
}

// Blank headers become "Unnamed: <index>"; repeats of "A" become "A.1", "A.2", ...
function uniqueHeaders(header: readonly string[]): string[] {
    const counts = new Map<string, number>();
    return header.map((raw, index) => {
        const name = raw === "" ? `Unnamed: ${index}` : raw;
        const seen = counts.get(name) ?? 0;
        counts.set(name, seen + 1);
        return seen === 0 ? name : `${name}.${seen}`;
    });
}

interface SourceRecord {
    fields: string[];
    // Offset just past the record, line break included
    end: number;
    quoteErrors: ParseError[];
}

function readRecords(text: string): SourceRecord[] {
    const records: SourceRecord[] = [];
    Papa.parse<string[]>(text, {
        delimiter: ",",
        skipEmptyLines: true,
        step: (results) => {
            records.push({
                fields: results.data,
                end: results.meta.cursor,
                quoteErrors: results.errors.filter((error) => error.type === "Quotes"),
            });
        },
    });
    return records.filter(({ fields }) => !(fields.length === 1 && fields[0].trim() === ""));
}

function endsQuotedField(text: string, quote: number): boolean {
    let next = quote + 1;
    while (text[next] === " " || text[next] === "\t") next++;
    const char = text[next];
    return char === undefined || char === "," || char === "\n" || char === "\r";
}

// Rewrites `"abc"def` as `"abcdef"` so the text after a closing quote stays in the field
function closeGluedQuotes(text: string): string {
    let out = "";
    let quoted = false;
    let glued = false;
    let fieldStart = true;

    for (let i = 0; i < text.length; i++) {
        const char = text[i];
        if (quoted) {
            if (char !== '"') {
                out += char;
            } else if (text[i + 1] === '"') {
                out += '""';
                i++;
            } else if (endsQuotedField(text, i)) {
                out += char;
                quoted = false;
            } else {
                quoted = false;
                glued = true;
            }
            continue;
        }

        const boundary = char === "," || char === "\n" || char === "\r";
        if (glued && boundary) {
            out += '"';
            glued = false;
        }
        if (glued) {
            out += char === '"' ? '""' : char;
            continue;
        }
        if (char === '"' && fieldStart) {
            quoted = true;
        }
        fieldStart = boundary;
        out += char;
    }

    return glued ? `${out}"` : out;
}

// 1-based line on which the character before `end` sits
function lineBefore(text: string, end: number): number {
    let line = 1;
    for (let offset = 0; offset < end - 1; offset++) {
        const char = text[offset];
        if (char === "\n" || (char === "\r" && text[offset + 1] !== "\n")) line++;
    }
    return line;
}

/**
 * Parses comma-delimited text whose first non-blank line is the header.
 * Short rows are padded with nulls; a row with more fields than the header is an error.
 */
export function parseDelimited(text: string): Table {
    let source = text;
    let records = readRecords(source);
    if (records.some(({ quoteErrors }) => quoteErrors.some((error) => error.code === "InvalidQuotes"))) {
        source = closeGluedQuotes(text);
        records = readRecords(source);
    }

    for (const { quoteErrors } of records) {
        const unterminated = quoteErrors.find((error) => error.code === "MissingQuotes");
        if (unterminated) {
            throw new Error(`Error tokenizing data. ${unterminated.message}`);
        }
    }

    const [header, ...body] = records;
    if (!header || header.fields.length === 0) {
        throw new Error("No columns to parse from file");
    }

    const columns = uniqueHeaders(header.fields);
    const rows = body.map(({ fields, end }) => {
        if (fields.length > columns.length) {
            throw new Error(
                `Error tokenizing data. Expected ${columns.length} fields in line ${lineBefore(source, end)}, saw ${fields.length}`,
            );
        }
        return columns.map((_, column) => toCell(fields[column]));
    });

    return { columns, rows };
}

export class TableDecoderService implements ITableDecoderService {
    constructor(private readonly candidates: readonly EncodingCandidate[] = ENCODING_CANDIDATES) {}

    decode(bytes: Uint8Array, label: string): Table {
        let failure = "no encoding to try";
        for (const candidate of this.candidates) {
            try {
                const table = parseDelimited(candidate.decode(bytes));
                log(`${label}: read as ${candidate.name}, ${table.rows.length} rows`, "decoder");
                return table;
            } catch (error) {
                failure = errorMessage(error);
                log(`${label}: ${candidate.name} failed (${failure})`, "decoder");
            }
        }

        // Latin-1 decodes any byte sequence, so this is the parser's complaint about the Latin-1 text
        throw new DecodeError(label, failure);
    }
}
