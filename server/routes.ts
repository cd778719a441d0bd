import type { Express, Request, Response } from "express";
import multer from "multer";
import {
  REPORT_LABELS,
  UPLOAD_FIELDS,
  XLSX_CONTENT_TYPE,
  type ReconcilePreviewResponse,
  type ReconciliationResult,
  type ReportKey,
} from "@shared/schema";
import { tableToRecords } from "@shared/table";
import type { AppConfig } from "./config";
import { HttpError } from "./errors";
import { logError } from "./log";
import type { ReconciliationServices } from "./services";

const REPORT_KEYS: readonly ReportKey[] = ["shipmentHistory", "edib2bi", "edi940"];

function uploadedBuffer(req: Request, field: string): Buffer {
  const files = req.files;
  const file = files && !Array.isArray(files) ? files[field]?.[0] : undefined;
  if (!file) {
    throw new HttpError(400, `No file uploaded for '${field}'`);
  }
  return file.buffer;
}

function sendError(res: Response, error: unknown, context: string) {
  if (error instanceof HttpError) {
    return res.status(error.status).json(error.toJSON());
  }
  logError(context, error);
  const message = error instanceof Error ? error.message : "";
  return res.status(500).json({ error: message || "Failed to reconcile reports" });
}

export function registerRoutes(app: Express, services: ReconciliationServices, config: AppConfig): void {
  // In-memory storage: uploads are only needed for the duration of the request
  const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: config.maxUploadBytes } });
  const reportUploads = upload.fields(REPORT_KEYS.map((key) => ({ name: UPLOAD_FIELDS[key], maxCount: 1 })));

  // Every upload is checked before any decoding starts
  function reconcileUploads(req: Request): ReconciliationResult {
    const buffers = REPORT_KEYS.map((key) => uploadedBuffer(req, UPLOAD_FIELDS[key]));
    const [shipmentHistory, edib2bi, edi940] = REPORT_KEYS.map((key, index) =>
      services.decoder.decode(buffers[index], REPORT_LABELS[key]),
    );
    return services.reconciliation.reconcile({ shipmentHistory, edib2bi, edi940 });
  }

  app.get("/api/health", (_req: Request, res: Response) => {
    res.json({ status: "ok" });
  });

  app.post("/api/reconcile", reportUploads, (req: Request, res: Response) => {
    try {
      const result = reconcileUploads(req);
      const buffer = services.encoder.encode(result.table);

      res.setHeader("Content-Type", XLSX_CONTENT_TYPE);
      res.setHeader("Content-Disposition", `attachment; filename="${result.fileName}"`);
      res.setHeader("X-Reconciled-Rows", String(result.table.rows.length));
      res.send(buffer);
    } catch (error: unknown) {
      sendError(res, error, "Reconciliation error");
    }
  });

  // Same reconciliation as above, returned as JSON for on-screen review
  app.post("/api/reconcile/preview", reportUploads, (req: Request, res: Response) => {
    try {
      const result = reconcileUploads(req);
      const body: ReconcilePreviewResponse = {
        fileName: result.fileName,
        columns: [...result.table.columns],
        rows: tableToRecords(result.table),
        rowCount: result.table.rows.length,
        stages: result.stages,
      };
      res.json(body);
    } catch (error: unknown) {
      sendError(res, error, "Reconciliation preview error");
    }
  });
}
