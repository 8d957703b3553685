/**
 * Statement Batch Processor
 *
 * Runs normalization, issuer detection, field extraction and record building
 * for each document of a batch. One record per document, in input order; an
 * exception inside one document becomes a failed record and the batch goes on.
 */

import type { DocumentText, ExtractionIssue, Issuer, StatementRecord } from '../types';
import type { ExtractionRule, FallbackRuleSet } from '../profiles/types';
import { GENERIC_RULES } from '../profiles';
import { normalizeText, type TextNormalizer } from './normalize';
import { IssuerDetector } from './detector';
import { extractFields } from './field-extractor';
import { buildStatementRecord, failedRecord } from './record-builder';
import { createDefaultRegistry, type IssuerRegistry } from './registry';
import { logger } from '../logger';
import { getContext, newCorrelationId, runWithContext } from '../context';
import {
  documentsProcessedCounter,
  extractionDurationHistogram,
  fieldMissesCounter,
} from '../metrics';

export interface BatchProcessorOptions {
  registry?: IssuerRegistry;
  fallback?: FallbackRuleSet;
  normalize?: TextNormalizer;
}

/**
 * Turn the mapping form of the input (file name → page texts) into
 * documents, keeping the map's insertion order.
 */
export function documentsFromMap(map: ReadonlyMap<string, readonly string[]>): DocumentText[] {
  return Array.from(map.entries(), ([fileName, pages]) => ({ fileName, pages }));
}

export class StatementBatchProcessor {
  private readonly detector: IssuerDetector;
  private readonly fallback: FallbackRuleSet;
  private readonly normalize: TextNormalizer;

  constructor(options: BatchProcessorOptions = {}) {
    this.detector = new IssuerDetector(options.registry ?? createDefaultRegistry());
    this.fallback = options.fallback ?? GENERIC_RULES;
    this.normalize = options.normalize ?? normalizeText;
  }

  /**
   * Process a batch. Never throws for a document-level failure.
   */
  process(documents: readonly DocumentText[]): StatementRecord[] {
    const correlationId = newCorrelationId();
    logger.info('Processing statement batch', { correlationId, documents: documents.length });

    const records = documents.map((document) => this.processInBatch(document, correlationId));

    logger.info('Statement batch complete', {
      correlationId,
      success: records.filter((r) => r.parsing_status === 'success').length,
      partial: records.filter((r) => r.parsing_status === 'partial').length,
      failed: records.filter((r) => r.parsing_status === 'failed').length,
    });

    return records;
  }

  /**
   * Process one document under a batch correlation ID, for callers that
   * read and report documents one at a time.
   */
  processInBatch(document: DocumentText, correlationId: string): StatementRecord {
    return runWithContext({ correlationId, fileName: document.fileName }, () =>
      this.processDocument(document)
    );
  }

  /**
   * Process one document. Exceptions are converted into a failed record.
   */
  private processDocument(document: DocumentText): StatementRecord {
    const endTimer = extractionDurationHistogram.startTimer();
    let issuer: Issuer = 'Unknown';
    let record: StatementRecord;

    try {
      record = this.extract(document);
      issuer = record.issuer;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Statement extraction failed', error);
      record = failedRecord(document.fileName, { kind: 'unexpected_failure', message });
    }

    endTimer({ issuer });
    documentsProcessedCounter.inc({ issuer, status: record.parsing_status });

    logger.info('Statement processed', {
      issuer: record.issuer,
      status: record.parsing_status,
      errors: record.errors.length,
    });

    return record;
  }

  private extract(document: DocumentText): StatementRecord {
    const { fileName } = document;

    if (document.extractionError !== undefined) {
      logger.warn('Document text could not be read', { error: document.extractionError });
      return failedRecord(fileName, { kind: 'source_unreadable', message: document.extractionError });
    }

    const text = this.normalize(document.pages);
    if (!text) {
      logger.warn('No usable text in document');
      return buildStatementRecord({
        fileName,
        issuer: 'Unknown',
        hasText: false,
        issues: [{ kind: 'normalization_empty' }],
      });
    }

    const detection = this.detector.detectWithEvidence(text);
    const issues: ExtractionIssue[] = [];
    let rules: readonly ExtractionRule[];

    if (detection.profile) {
      rules = detection.profile.rules;
      const context = getContext();
      if (context) context.issuer = detection.issuer;
      logger.debug('Issuer detected', { matchedMarkers: detection.matchedMarkers });
    } else {
      rules = this.fallback.rules;
      issues.push({ kind: 'issuer_unrecognized' });
      logger.info('Issuer not recognized, applying fallback rules', {
        fallback: this.fallback.description,
      });
    }

    const extraction = extractFields(text, rules);
    issues.push(...extraction.issues);

    for (const issue of extraction.issues) {
      if (issue.kind === 'field_not_found' || issue.kind === 'field_invalid') {
        fieldMissesCounter.inc({ issuer: detection.issuer, field: issue.field });
      }
    }

    logger.debug('Fields extracted', {
      found: extraction.foundCount,
      missing: extraction.issues.length,
    });

    return buildStatementRecord({
      fileName,
      issuer: detection.issuer,
      hasText: true,
      outcomes: extraction.outcomes,
      issues,
    });
  }
}
