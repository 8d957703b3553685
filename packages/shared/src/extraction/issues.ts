/**
 * Extraction issue formatting.
 *
 * Issues are the non-fatal failures collected while processing a statement.
 * Each one becomes exactly one human-readable error note on the record.
 */

import type { ExtractionIssue } from '../types';

export function formatIssue(issue: ExtractionIssue): string {
  switch (issue.kind) {
    case 'source_unreadable':
      return `source: could not read document (${issue.message})`;
    case 'normalization_empty':
      return 'text: no extractable text found';
    case 'issuer_unrecognized':
      return 'issuer: not recognized, generic rules applied';
    case 'field_not_found':
      return `${issue.field}: not found`;
    case 'field_invalid':
      return `${issue.field}: invalid value "${issue.raw}"`;
    case 'unexpected_failure':
      return `extraction failed: ${issue.message}`;
  }
}
