import type { TraceEntry } from '../types/verification';

export function ts() {
  return new Date().toISOString();
}

export function pushTrace(
  trace: TraceEntry[],
  step: string,
  status: TraceEntry['status'],
  detail: string
): void {
  trace.push({ step, status, detail, timestamp: ts() });
}

export function formatTrace(trace: readonly TraceEntry[]): string[] {
  return trace.map((t) => `${t.timestamp} [${t.status}] ${t.step}: ${t.detail}`);
}
