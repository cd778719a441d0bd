import * as fs from 'fs';
import * as path from 'path';
import { REPORT_LABELS } from '../shared/schema';
import { HttpError } from '../server/errors';
import { log, logError } from '../server/log';
import { services } from '../server/services';

const USAGE = 'Usage: tsx scripts/reconcile-files.ts <shipment_history.csv> <edib2bi.csv> <edi940.csv> [outDir]';

class UsageError extends Error {}

function reconcileFiles(args: string[]): string {
  if (args.length < 3 || args.length > 4) {
    throw new UsageError(USAGE);
  }

  const [shipmentHistoryPath, edib2biPath, edi940Path, outDir = process.cwd()] = args;

  const read = (filePath: string, label: string) => {
    log(`Reading ${label} from ${filePath}`, 'cli');
    return services.decoder.decode(fs.readFileSync(filePath), label);
  };

  const result = services.reconciliation.reconcile({
    shipmentHistory: read(shipmentHistoryPath, REPORT_LABELS.shipmentHistory),
    edib2bi: read(edib2biPath, REPORT_LABELS.edib2bi),
    edi940: read(edi940Path, REPORT_LABELS.edi940),
  });

  fs.mkdirSync(outDir, { recursive: true });
  const outputPath = path.join(outDir, result.fileName);
  fs.writeFileSync(outputPath, services.encoder.encode(result.table));

  log(`Wrote ${result.table.rows.length} rows to ${outputPath}`, 'cli');
  return outputPath;
}

try {
  reconcileFiles(process.argv.slice(2));
} catch (error) {
  if (error instanceof HttpError || error instanceof UsageError) {
    console.error(error.message);
  } else {
    logError('Reconciliation failed', error, 'cli');
  }
  process.exitCode = 1;
}
