import { ReconciliationService } from "./Service/Implementations/ReconciliationService";
import { SpreadsheetEncoderService } from "./Service/Implementations/SpreadsheetEncoderService";
import { TableDecoderService } from "./Service/Implementations/TableDecoderService";
import type { IReconciliationService } from "./Service/Abstractions/IReconciliationService";
import type { ISpreadsheetEncoderService } from "./Service/Abstractions/ISpreadsheetEncoderService";
import type { ITableDecoderService } from "./Service/Abstractions/ITableDecoderService";

export interface ReconciliationServices {
  decoder: ITableDecoderService;
  reconciliation: IReconciliationService;
  encoder: ISpreadsheetEncoderService;
}

export function createServices(overrides: Partial<ReconciliationServices> = {}): ReconciliationServices {
  return {
    decoder: overrides.decoder ?? new TableDecoderService(),
    reconciliation: overrides.reconciliation ?? new ReconciliationService(),
    encoder: overrides.encoder ?? new SpreadsheetEncoderService(),
  };
}

export const services = createServices();
