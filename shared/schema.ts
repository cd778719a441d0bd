// Report contract shared by the three source systems.
// Column names below are fixed by agreement with those systems; they are not configurable.

export type Cell = string | number | boolean | Date | null;

export interface Table {
  readonly columns: readonly string[];
  readonly rows: readonly (readonly Cell[])[];
}

export type TableRecord = Record<string, Cell>;

// Labels used in error messages, matching the report file names users download
export const REPORT_LABELS = {
  shipmentHistory: "Shipment_History___Total",
  edib2bi: "EDIB2BiReportV2",
  edi940: "EDI940Report_withCostV2.0",
} as const;

export type ReportKey = keyof typeof REPORT_LABELS;

// Upload field names accepted by POST /api/reconcile
export const UPLOAD_FIELDS = {
  shipmentHistory: "shipment_history",
  edib2bi: "edib2bi",
  edi940: "edi940",
} as const satisfies Record<ReportKey, string>;

export const JOIN_KEYS = {
  shipmentHistory: "Pickticket",
  edib2bi: "AXReferenceID",
  edi940: "PickRoute",
} as const satisfies Record<ReportKey, string>;

// Columns kept after joining shipment history with the EDI B2Bi report
export const EDIB2BI_PROJECTION = [
  "Warehouse",
  "Pickticket",
  "Order",
  "Drop Date",
  "Ship Date",
  "Ship To",
  "Ship State",
  "Zip Code",
  "Customer PO",
  "Ship Via",
  "Load ID",
  "Weight",
  "SKU",
  "Units",
  "Price",
  "Size Type",
  "Size",
  "Product Type",
  "InvoiceNumber",
  "StatusSummary",
  "ERRORDESCRIPTION",
] as const;

// Columns kept after the EDI 940 join. Pickticket leads here, unlike the first list.
export const EDI940_PROJECTION = [
  "Pickticket",
  "Warehouse",
  "Order",
  "Drop Date",
  "Ship Date",
  "Ship To",
  "Ship State",
  "Zip Code",
  "Customer PO",
  "Ship Via",
  "Load ID",
  "Weight",
  "SKU",
  "Units",
  "Price",
  "Size Type",
  "Size",
  "Product Type",
  "InvoiceNumber",
  "StatusSummary",
  "ERRORDESCRIPTION",
  "PickRoute",
  "SalesHeaderStatus",
  "SalesHeaderDocStatus",
  "PickModeOfDelivery",
  "PickCreatedDate",
  "DeliveryDate",
] as const;

export const OUTPUT_COLUMN_RENAMES: Readonly<Record<string, string>> = {
  InvoiceNumber: "Received in EDI?",
  StatusSummary: "EDI Processing Status",
  ERRORDESCRIPTION: "EDI Message",
  PickRoute: "Found in AX DATa?",
};

// A shipment is reported as missing its 945 when AX is still at the picking list
// and the EDI side recorded a load failure.
export const LOAD_FAILURE_FILTER = {
  docStatusColumn: "SalesHeaderDocStatus",
  docStatusValue: "Picking List",
  ediStatusColumn: "EDI Processing Status",
  ediStatusValue: "AX Load Failure",
} as const;

export const DEDUPE_COLUMN = "Pickticket";

export const XLSX_CONTENT_TYPE = "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";

export interface StageTrace {
  stage: string;
  rows: number;
  columns: number;
}

export interface ReconciliationResult {
  table: Table;
  fileName: string;
  stages: StageTrace[];
}

export interface ReconcilePreviewResponse {
  fileName: string;
  columns: string[];
  rows: TableRecord[];
  rowCount: number;
  stages: StageTrace[];
}
