/**
 * Default DiagnosticsPort adapters.
 */

import type { CollectingDiagnostics, DiagnosticsPort } from './diagnostics.js';

/**
 * Writes warnings to stderr so they never mix with graph output on stdout.
 */
export const consoleDiagnostics: DiagnosticsPort = {
  warn(message: string): void {
    console.warn(`[warn] ${message}`);
  },
};

export const silentDiagnostics: DiagnosticsPort = {
  warn(_message: string): void {
    // No-op
  },
};

export function createCollectingDiagnostics(): CollectingDiagnostics {
  const warnings: string[] = [];
  return {
    warnings,
    warn(message: string): void {
      warnings.push(message);
    },
  };
}
