import { format } from "date-fns";
import {
    DEDUPE_COLUMN,
    EDI940_PROJECTION,
    EDIB2BI_PROJECTION,
    JOIN_KEYS,
    LOAD_FAILURE_FILTER,
    OUTPUT_COLUMN_RENAMES,
    REPORT_LABELS,
    type ReconciliationResult,
    type ReportKey,
    type StageTrace,
    type Table,
} from "@shared/schema";
import {
    dropDuplicates,
    filterRows,
    hasColumn,
    leftJoin,
    normalizeHeaders,
    renameColumns,
    selectColumns,
} from "@shared/table";
import { MissingColumnError } from "../../errors";
import { log } from "../../log";
import type { IReconciliationService, ReconciliationInputs } from "../Abstractions/IReconciliationService";

export type Clock = () => Date;

export interface PipelineState {
    inputs: ReconciliationInputs;
    // Table being reconciled; starts as the shipment history
    working: Table;
}

export interface PipelineStage {
    name: string;
    apply(state: PipelineState): PipelineState;
}

const REPORT_KEYS: readonly ReportKey[] = ["shipmentHistory", "edib2bi", "edi940"];

function joinOnPickticket(working: Table, right: Table, rightOn: string): Table {
    const leftOn = JOIN_KEYS.shipmentHistory;
    // A Pickticket column on the EDI side collides in the first join and is suffixed away
    if (!hasColumn(working, leftOn)) {
        throw new MissingColumnError(
            `${REPORT_LABELS.shipmentHistory} joined with ${REPORT_LABELS.edib2bi}`,
            leftOn,
            working.columns,
        );
    }
    return normalizeHeaders(leftJoin(working, right, { leftOn, rightOn }));
}

export const RECONCILIATION_STAGES: readonly PipelineStage[] = [
    {
        name: "normalize-headers",
        apply: ({ inputs }) => {
            const normalized: ReconciliationInputs = {
                shipmentHistory: normalizeHeaders(inputs.shipmentHistory),
                edib2bi: normalizeHeaders(inputs.edib2bi),
                edi940: normalizeHeaders(inputs.edi940),
            };
            return { inputs: normalized, working: normalized.shipmentHistory };
        },
    },
    {
        name: "validate-required-columns",
        apply: (state) => {
            for (const key of REPORT_KEYS) {
                const table = state.inputs[key];
                if (!hasColumn(table, JOIN_KEYS[key])) {
                    throw new MissingColumnError(REPORT_LABELS[key], JOIN_KEYS[key], table.columns);
                }
            }
            return state;
        },
    },
    {
        name: "join-edib2bi",
        apply: (state) => ({
            ...state,
            working: joinOnPickticket(state.working, state.inputs.edib2bi, JOIN_KEYS.edib2bi),
        }),
    },
    {
        name: "project-edib2bi-columns",
        apply: (state) => ({ ...state, working: selectColumns(state.working, EDIB2BI_PROJECTION) }),
    },
    {
        name: "join-edi940",
        apply: (state) => ({
            ...state,
            working: joinOnPickticket(state.working, state.inputs.edi940, JOIN_KEYS.edi940),
        }),
    },
    {
        name: "project-edi940-columns",
        apply: (state) => ({ ...state, working: selectColumns(state.working, EDI940_PROJECTION) }),
    },
    {
        name: "rename-columns",
        apply: (state) => ({ ...state, working: renameColumns(state.working, OUTPUT_COLUMN_RENAMES) }),
    },
    {
        name: "filter-load-failures",
        apply: (state) => {
            const { docStatusColumn, docStatusValue, ediStatusColumn, ediStatusValue } = LOAD_FAILURE_FILTER;
            const docStatus = state.working.columns.indexOf(docStatusColumn);
            const ediStatus = state.working.columns.indexOf(ediStatusColumn);
            if (docStatus === -1 || ediStatus === -1) return state;

            return {
                ...state,
                working: filterRows(
                    state.working,
                    (row) => row[docStatus] === docStatusValue && row[ediStatus] === ediStatusValue,
                ),
            };
        },
    },
    {
        name: "dedupe-pickticket",
        apply: (state) => ({ ...state, working: dropDuplicates(state.working, DEDUPE_COLUMN) }),
    },
];

export function missingReportFileName(date: Date): string {
    return `MISSING_945_${format(date, "MMddyy")}.xlsx`;
}

export function runStages(
    inputs: ReconciliationInputs,
    stages: readonly PipelineStage[] = RECONCILIATION_STAGES,
): { table: Table; stages: StageTrace[] } {
    let state: PipelineState = { inputs, working: inputs.shipmentHistory };
    const trace: StageTrace[] = [];

    for (const stage of stages) {
        state = stage.apply(state);
        trace.push({ stage: stage.name, rows: state.working.rows.length, columns: state.working.columns.length });
    }

    return { table: state.working, stages: trace };
}

export class ReconciliationService implements IReconciliationService {
    constructor(
        private readonly clock: Clock = () => new Date(),
        private readonly stages: readonly PipelineStage[] = RECONCILIATION_STAGES,
    ) {}

    reconcile(inputs: ReconciliationInputs): ReconciliationResult {
        const fileName = missingReportFileName(this.clock());
        const { table, stages } = runStages(inputs, this.stages);

        for (const trace of stages) {
            log(`${trace.stage}: ${trace.rows} rows x ${trace.columns} columns`, "reconcile");
        }
        log(`${fileName}: ${table.rows.length} shipments missing a 945`, "reconcile");

        return { table, fileName, stages };
    }
}
