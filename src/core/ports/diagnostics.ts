/**
 * Diagnostics Port Interface
 *
 * Side channel for non-fatal conditions found while resolving manifests:
 * a glob that matched nothing, a folder reference that is missing or not a
 * directory. Reporting through this port never changes the resolution
 * result and never throws.
 *
 * Implementations:
 *   - consoleDiagnostics (CLI): prints to stderr
 *   - collecting diagnostics (tests, embedding tools): records messages in order
 *   - silentDiagnostics: discards everything
 */
export interface DiagnosticsPort {
  /** Report a non-fatal warning */
  warn(message: string): void;
}

/**
 * A DiagnosticsPort that keeps every message it receives.
 */
export interface CollectingDiagnostics extends DiagnosticsPort {
  readonly warnings: readonly string[];
}
