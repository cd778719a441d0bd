import type { ReconciliationResult, Table } from "@shared/schema";

export interface ReconciliationInputs {
    shipmentHistory: Table;
    edib2bi: Table;
    edi940: Table;
}

export interface IReconciliationService {
    // Joins, filters and de-duplicates the three reports. Throws MissingColumnError when a join key is absent.
    reconcile(inputs: ReconciliationInputs): ReconciliationResult;
}
