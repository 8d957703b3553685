/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type OutputFormat = 'summary' | 'table' | 'both';

export interface Config {
  // Logging
  logLevel: LogLevel;

  // Contracts (JSON schemas)
  contractsPath: string;

  // CLI
  defaultOutputFormat: OutputFormat;

  // Metrics
  metricsPrefix: string;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];
const OUTPUT_FORMATS: readonly OutputFormat[] = ['summary', 'table', 'both'];

function parseLogLevel(value: string | undefined): LogLevel {
  const level = LOG_LEVELS.find((l) => l === value?.toLowerCase());
  return level ?? 'info';
}

function parseOutputFormat(value: string | undefined): OutputFormat {
  const format = OUTPUT_FORMATS.find((f) => f === value?.toLowerCase());
  return format ?? 'both';
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((f) => f === value);
}

export const config: Config = {
  // Logging
  logLevel: parseLogLevel(process.env.LOG_LEVEL),

  // Contracts
  contractsPath: process.env.CONTRACTS_PATH || '',

  // CLI
  defaultOutputFormat: parseOutputFormat(process.env.OUTPUT_FORMAT),

  // Metrics
  metricsPrefix: process.env.METRICS_PREFIX || 'ccstatement',
};
