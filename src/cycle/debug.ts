/**
 * Solver trace for the cycle engine.
 *
 * Off by default. When on, resolver, evaluator and sweep steps append one
 * line each; only the newest MAX_TRACE_ENTRIES are kept.
 */

const MAX_TRACE_ENTRIES = 100;

let traceEnabled = false;
const trace: string[] = [];

export function setCycleDebug(enabled: boolean): void {
  if (enabled && !traceEnabled) {
    console.log(`[Cycle] Solver trace on (last ${MAX_TRACE_ENTRIES} entries kept)`);
  }
  traceEnabled = enabled;
}

export function isCycleDebugEnabled(): boolean {
  return traceEnabled;
}

export function getCycleDebugLog(): readonly string[] {
  return trace.slice();
}

export function clearCycleDebugLog(): void {
  trace.length = 0;
}

export function logDebug(line: string): void {
  if (!traceEnabled) return;
  trace.push(line);
  if (trace.length > MAX_TRACE_ENTRIES) {
    trace.splice(0, trace.length - MAX_TRACE_ENTRIES);
  }
}
