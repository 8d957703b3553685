/**
 * Command-line arguments.
 */

import { parseArgs } from 'node:util';
import { config, isOutputFormat, type OutputFormat } from '@ccparse/shared';

export const USAGE = `Usage: ccstatement [options] [files...]

Parse credit card statements from multiple issuers.

Options:
  -d, --dir <dir>           Directory containing PDF files
  -f, --format <format>     Output format: summary, table or both (default: ${config.defaultOutputFormat})
  -j, --json <path>         Export results to a JSON file
      --metrics-file <path> Write run metrics in Prometheus text format
  -h, --help                Show this help

Examples:
  ccstatement statement1.pdf statement2.pdf
  ccstatement --dir ./statements/
  ccstatement statement.pdf --format table --json output.json`;

export interface CliOptions {
  files: string[];
  dir?: string;
  format: OutputFormat;
  json?: string;
  metricsFile?: string;
  help: boolean;
}

/**
 * @throws Error on unknown options or an invalid format
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: [...argv],
    allowPositionals: true,
    options: {
      dir: { type: 'string', short: 'd' },
      format: { type: 'string', short: 'f' },
      json: { type: 'string', short: 'j' },
      'metrics-file': { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  const format = values.format ?? config.defaultOutputFormat;
  if (!isOutputFormat(format)) {
    throw new Error(`Invalid format: ${format} (expected summary, table or both)`);
  }

  return {
    files: positionals,
    dir: values.dir,
    format,
    json: values.json,
    metricsFile: values['metrics-file'],
    help: values.help ?? false,
  };
}
