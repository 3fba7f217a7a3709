import { VerifyResult, VerifySummary } from '../../services/verify/verifyService.js';
import { Theme, paint } from '../theme.js';

export function formatVerifyResult(theme: Theme, result: VerifyResult): string {
  switch (result.status) {
    case 'verified':
      return `${paint(theme, 'green', theme.symbols.ok)} ${result.path} ${theme.labels.verified}`;
    case 'mismatch':
      return `${paint(theme, 'red', theme.symbols.fail)} ${result.path} ${theme.labels.mismatch} expected ${result.expected}, got ${result.actual}`;
    case 'skipped':
      return `${paint(theme, 'dim', theme.symbols.skip)} ${result.path} (${result.reason})`;
    case 'failed':
      return `${paint(theme, 'red', theme.symbols.fail)} ${result.path}: ${result.error}`;
  }
}

export function formatVerifySummary(summary: VerifySummary): string {
  return `${summary.verified} verified, ${summary.mismatch} mismatched, ${summary.skipped} skipped, ${summary.failed} failed`;
}
