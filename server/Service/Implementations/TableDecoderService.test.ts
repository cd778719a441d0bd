import { describe, expect, it, vi } from "vitest";
import { DecodeError } from "../../errors";
import { TableDecoderService, parseDelimited } from "./TableDecoderService";

vi.mock("../../log", () => ({ log: vi.fn(), logError: vi.fn() }));

const decoder = new TableDecoderService();

function decodeError(bytes: Uint8Array, label: string, service = decoder): DecodeError {
    try {
        service.decode(bytes, label);
    } catch (error) {
        if (error instanceof DecodeError) return error;
        throw error;
    }
    throw new Error("expected a DecodeError");
}

describe("parseDelimited", () => {
    it("reads the header and keeps values as strings", () => {
        const table = parseDelimited("Pickticket,Units,Price\nP1,4,12.50\n");

        expect(table.columns).toEqual(["Pickticket", "Units", "Price"]);
        expect(table.rows).toEqual([["P1", "4", "12.50"]]);
    });

    it("handles quoted fields with commas and line breaks", () => {
        const table = parseDelimited('Pickticket,Ship To\nP1,"Acme, Inc.\nDock 4"\n');

        expect(table.rows).toEqual([["P1", "Acme, Inc.\nDock 4"]]);
    });

    it("reads empty fields and NA markers as null", () => {
        const table = parseDelimited("A,B,C,D\n,NA,N/A,x\n");

        expect(table.rows).toEqual([[null, null, null, "x"]]);
    });

    it("names blank headers and numbers repeated ones", () => {
        const table = parseDelimited(",SKU,SKU,SKU\n1,2,3,4\n");

        expect(table.columns).toEqual(["Unnamed: 0", "SKU", "SKU.1", "SKU.2"]);
    });

    it("pads short rows and skips blank lines", () => {
        const table = parseDelimited("A,B\n\n1\n\n2,3\n");

        expect(table.rows).toEqual([
            ["1", null],
            ["2", "3"],
        ]);
    });

    it("treats whitespace-only lines as blank but keeps rows of bare commas", () => {
        expect(parseDelimited("A,B\n1,2\n   \n3,4\n").rows).toEqual([
            ["1", "2"],
            ["3", "4"],
        ]);
        expect(parseDelimited("A,B\n,\n").rows).toEqual([[null, null]]);
    });

    it("keeps text that follows a closing quote", () => {
        expect(parseDelimited('A,B\n"abc"def,2\n').rows).toEqual([["abcdef", "2"]]);
        expect(parseDelimited('A,B\n"a""b"c,"x"\n"d",4\n').rows).toEqual([
            ['a"bc', "x"],
            ["d", "4"],
        ]);
    });

    it("rejects a quoted field that is never closed", () => {
        expect(() => parseDelimited('A,B\n"abc,2\n')).toThrow("Error tokenizing data. Quoted field unterminated");
    });

    it("rejects rows longer than the header", () => {
        expect(() => parseDelimited("A,B\n1,2,3\n")).toThrow(
            "Error tokenizing data. Expected 2 fields in line 2, saw 3",
        );
    });

    it("counts blank lines and quoted line breaks in the reported line", () => {
        expect(() => parseDelimited("A,B\n\n\n1,2\n1,2,3\n")).toThrow(
            "Error tokenizing data. Expected 2 fields in line 5, saw 3",
        );
        expect(() => parseDelimited('A,B\n"x\ny",2,3\n')).toThrow(
            "Error tokenizing data. Expected 2 fields in line 3, saw 3",
        );
        expect(() => parseDelimited("A,B\r\n\r\n1,2,3\r\n")).toThrow(
            "Error tokenizing data. Expected 2 fields in line 3, saw 3",
        );
    });
});

describe("TableDecoderService", () => {
    const csv = "Pickticket,Ship To\nP1,Café Dock\n";

    it("reads UTF-8", () => {
        const table = decoder.decode(Buffer.from(csv, "utf8"), "EDIB2BiReportV2");

        expect(table.columns).toEqual(["Pickticket", "Ship To"]);
        expect(table.rows).toEqual([["P1", "Café Dock"]]);
    });

    it("strips a UTF-8 byte order mark", () => {
        const bytes = Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from(csv, "utf8")]);

        expect(decoder.decode(bytes, "EDIB2BiReportV2").columns).toEqual(["Pickticket", "Ship To"]);
    });

    it("reads little-endian UTF-16 with a byte order mark", () => {
        const bytes = Buffer.concat([Buffer.from([0xff, 0xfe]), Buffer.from(csv, "utf16le")]);

        const table = decoder.decode(bytes, "EDIB2BiReportV2");

        expect(table.columns).toEqual(["Pickticket", "Ship To"]);
        expect(table.rows).toEqual([["P1", "Café Dock"]]);
    });

    it("reads big-endian UTF-16 with a byte order mark", () => {
        const bytes = Buffer.concat([Buffer.from([0xff, 0xfe]), Buffer.from(csv, "utf16le")]).swap16();

        expect(decoder.decode(bytes, "EDIB2BiReportV2").rows).toEqual([["P1", "Café Dock"]]);
    });

    it("falls back to Latin-1 for bytes that are not UTF-8", () => {
        const table = decoder.decode(Buffer.from(csv, "latin1"), "EDIB2BiReportV2");

        expect(table.rows).toEqual([["P1", "Café Dock"]]);
    });

    it("reports an empty upload with the table label", () => {
        const error = decodeError(new Uint8Array(0), "EDI940Report_withCostV2.0");

        expect(error.message).toBe("CSV read error: No columns to parse from file");
        expect(error.table).toBe("EDI940Report_withCostV2.0");
        expect(error.status).toBe(400);
    });

    it("reports the failure of the last encoding tried", () => {
        const service = new TableDecoderService([
            {
                name: "never",
                decode: () => {
                    throw new Error("cannot decode");
                },
            },
            { name: "unclosed", decode: () => 'A,B\n"1,2\n' },
        ]);

        const error = decodeError(Buffer.from("A,B\n1,2\n", "utf8"), "EDIB2BiReportV2", service);

        expect(error.message).toBe("CSV read error: Error tokenizing data. Quoted field unterminated");
        expect(error.table).toBe("EDIB2BiReportV2");
    });

    it("reports rows that no encoding can fit under the header", () => {
        const error = decodeError(Buffer.from("A,B\n1,2,3\n", "utf8"), "Shipment_History___Total");

        expect(error.message).toBe("CSV read error: Error tokenizing data. Expected 2 fields in line 2, saw 3");
    });
});
