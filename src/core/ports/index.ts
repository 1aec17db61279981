/**
 * Core Ports
 *
 * Boundary between the resolver and whoever reports its diagnostics.
 */

export type { DiagnosticsPort, CollectingDiagnostics } from './diagnostics.js';
export { consoleDiagnostics, silentDiagnostics, createCollectingDiagnostics } from './console-diagnostics.js';
