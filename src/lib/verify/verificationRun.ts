import type { TraceEntry, VerificationState } from '../../types/verification';
import { describeError } from '../errors';
import { pushTrace } from '../trace';

const TRANSITIONS: Record<VerificationState, readonly VerificationState[]> = {
  // images handed in pre-rendered skip straight to the form check
  Idle: ['RasterizingEvidence', 'RunningFormCheck', 'Failed'],
  RasterizingEvidence: ['RasterizingTarget', 'Failed'],
  RasterizingTarget: ['RunningFormCheck', 'Failed'],
  // a failed form check still moves on to the cross check
  RunningFormCheck: ['RunningCrossCheck', 'Failed'],
  RunningCrossCheck: ['Merging', 'Failed'],
  Merging: ['Done', 'Failed'],
  Done: [],
  Failed: [],
};

export type StateListener = (state: VerificationState, error?: unknown) => void;

/** Request-scoped state of one verification. Nothing here outlives the request. */
export class VerificationRun {
  private current: VerificationState = 'Idle';
  private failure: unknown = undefined;
  readonly trace: TraceEntry[] = [];

  constructor(private readonly listener?: StateListener) {}

  get state(): VerificationState {
    return this.current;
  }

  get error(): unknown {
    return this.failure;
  }

  transition(next: Exclude<VerificationState, 'Failed'>, detail: string): void {
    this.assertAllowed(next);
    this.current = next;
    pushTrace(this.trace, next, next === 'Done' ? 'success' : 'info', detail);
    this.listener?.(next);
  }

  fail(error: unknown): void {
    if (this.current === 'Failed') return;
    this.assertAllowed('Failed');
    this.current = 'Failed';
    this.failure = error;
    pushTrace(this.trace, 'Failed', 'error', describeError(error));
    this.listener?.('Failed', error);
  }

  /** Ignored once the run is Done or Failed; a concurrent pass can settle after that. */
  note(step: string, status: TraceEntry['status'], detail: string): void {
    if (TRANSITIONS[this.current].length === 0) return;
    pushTrace(this.trace, step, status, detail);
  }

  private assertAllowed(next: VerificationState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal verification state transition: ${this.current} -> ${next}`);
    }
  }
}
