/**
 * Statement CLI Run
 *
 * Reads each selected PDF in turn, extracts its record and reports progress
 * as it goes, then prints the chosen views and writes the requested files.
 */

import fs from 'fs';
import path from 'path';
import {
  getMetrics,
  logger,
  newCorrelationId,
  validateStatementRecord,
  StatementBatchProcessor,
  type DocumentText,
  type StatementRecord,
} from '@ccparse/shared';
import { parseCliArgs, USAGE, type CliOptions } from './args';
import { collectPdfFiles, type FileSelection } from './files';
import { extractDocumentText } from './pdf';
import {
  computeStats,
  renderOutcome,
  renderProcessing,
  renderStats,
  renderSummary,
  renderTable,
} from './render';

function exportJson(records: readonly StatementRecord[], outputPath: string): void {
  records.forEach((record) => {
    const result = validateStatementRecord(record);
    if (!result.valid) {
      logger.warn('Exported record does not match schema', {
        file_name: record.file_name,
        errors: result.errors,
      });
    }
  });

  fs.writeFileSync(outputPath, JSON.stringify(records, null, 2));
  console.log(`\nJSON exported to: ${outputPath}`);
}

/** Reads one PDF path into statement text */
export type DocumentReader = (filePath: string) => Promise<DocumentText>;

/**
 * Run the CLI and resolve with the process exit code.
 */
export async function runCli(
  argv: readonly string[],
  readDocument: DocumentReader = extractDocumentText
): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    return 1;
  }

  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  let selection: FileSelection;
  try {
    selection = collectPdfFiles(options.files, options.dir);
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }

  for (const missing of selection.missing) {
    console.error(`Warning: File not found: ${missing}`);
  }

  if (selection.files.length === 0) {
    console.error('No PDF files found. Use --help for usage information.');
    return 1;
  }

  console.log(`\nParsing ${selection.files.length} statement(s)...\n`);

  const processor = new StatementBatchProcessor();
  const correlationId = newCorrelationId();
  const records: StatementRecord[] = [];

  for (const filePath of selection.files) {
    console.log(renderProcessing(path.basename(filePath)));
    const record = processor.processInBatch(await readDocument(filePath), correlationId);
    console.log(renderOutcome(record));
    records.push(record);
  }

  if (options.format === 'summary' || options.format === 'both') {
    console.log(renderSummary(records));
  }
  if (options.format === 'table' || options.format === 'both') {
    console.log(renderTable(records));
  }

  if (options.json) {
    exportJson(records, options.json);
  }

  if (options.metricsFile) {
    fs.writeFileSync(options.metricsFile, await getMetrics());
    logger.info('Metrics written', { path: options.metricsFile });
  }

  const stats = computeStats(records);
  logger.info('Statement batch complete', { correlationId, ...stats });
  console.log(renderStats(stats));

  return stats.failed > 0 ? 1 : 0;
}
