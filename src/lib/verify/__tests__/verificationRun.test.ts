import { describe, it, expect, vi } from 'vitest';
import { VerificationRun } from '../verificationRun';
import { ValidationError } from '../../errors';
import { formatTrace } from '../../trace';

describe('VerificationRun', () => {
  it('walks the full path and reports each state', () => {
    const listener = vi.fn();
    const run = new VerificationRun(listener);

    run.transition('RasterizingEvidence', '1 document');
    run.transition('RasterizingTarget', 'target.pdf');
    run.transition('RunningFormCheck', '5 pages');
    run.transition('RunningCrossCheck', '6 images');
    run.transition('Merging', 'merge');
    run.transition('Done', 'ok');

    expect(run.state).toBe('Done');
    expect(listener.mock.calls.map((c) => c[0])).toEqual([
      'RasterizingEvidence',
      'RasterizingTarget',
      'RunningFormCheck',
      'RunningCrossCheck',
      'Merging',
      'Done',
    ]);
    expect(run.trace.map((t) => t.status)).toEqual(['info', 'info', 'info', 'info', 'info', 'success']);
  });

  it('allows pre-rendered images to start at the form check', () => {
    const run = new VerificationRun();
    run.transition('RunningFormCheck', 'images');
    expect(run.state).toBe('RunningFormCheck');
  });

  it('throws on an illegal transition', () => {
    const run = new VerificationRun();
    expect(() => run.transition('Merging', 'too early')).toThrow(
      'Illegal verification state transition: Idle -> Merging'
    );
    expect(run.state).toBe('Idle');
  });

  it('records a failure once', () => {
    const listener = vi.fn();
    const run = new VerificationRun(listener);
    const error = new ValidationError('no evidence');

    run.transition('RasterizingEvidence', '0 documents');
    run.fail(error);
    run.fail(new Error('second'));

    expect(run.state).toBe('Failed');
    expect(run.error).toBe(error);
    expect(listener).toHaveBeenLastCalledWith('Failed', error);
    expect(run.trace.filter((t) => t.status === 'error')).toHaveLength(1);
  });

  it('ignores notes after the run has settled', () => {
    const failed = new VerificationRun();
    failed.transition('RunningFormCheck', 'images');
    failed.transition('RunningCrossCheck', 'images');
    failed.fail(new Error('blocked'));
    failed.note('Form check', 'success', '2 finding(s)');
    expect(failed.trace.map((t) => t.step)).toEqual(['RunningFormCheck', 'RunningCrossCheck', 'Failed']);

    const done = new VerificationRun();
    done.transition('RunningFormCheck', 'images');
    done.transition('RunningCrossCheck', 'images');
    done.transition('Merging', 'merge');
    done.transition('Done', 'ok');
    done.note('Form check', 'warning', 'late');
    expect(done.trace).toHaveLength(4);
  });

  it('formats trace lines', () => {
    const run = new VerificationRun();
    run.note('Form check', 'warning', 'blocked');
    const [entry] = run.trace;
    expect(formatTrace(run.trace)).toEqual([`${entry.timestamp} [warning] Form check: blocked`]);
  });
});
