/**
 * Tests for the benchmark session runner
 */

import { describe, it, expect, vi, beforeAll } from 'vitest';
import { indent, runSession, runSingleTask, type TaskRunner } from '../session-runner.js';
import type { RunOutcome, Task } from '../../core/agent.js';
import { FakeHarness } from '../../__tests__/fakes.js';
import { logger, LogLevel } from '../../utils/logger.js';

const tasks: Task[] = [
  { taskId: 't1', specId: 'alpha', taskText: 'first' },
  { taskId: 't2', specId: 'beta', taskText: 'second' },
  { taskId: 't3', specId: 'gamma', taskText: 'third' },
];

function outcome(status: RunOutcome['status']): RunOutcome {
  return { status, steps: 1, fingerprint: 'fp', log: [] };
}

const metadata = { benchmark: 'erc3-test', workspace: 'my', name: 'unit', architecture: 'test' };

describe('runSession', () => {
  beforeAll(() => {
    logger.setLogLevel(LogLevel.SILENT);
  });

  it('keeps going after a task fails and still completes it', async () => {
    const harness = new FakeHarness(tasks);
    harness.scores.set('t1', 1);
    harness.scores.set('t3', 0.5);

    const runTask: TaskRunner = vi.fn(async (task: Task) => {
      if (task.taskId === 't2') {
        throw new Error('model unavailable');
      }
      return outcome('completed');
    });

    const summary = await runSession(harness, runTask, metadata);

    expect(runTask).toHaveBeenCalledTimes(3);
    expect(summary).toEqual({
      sessionId: 'ses-1',
      results: [
        { taskId: 't1', specId: 'alpha', status: 'completed', score: 1 },
        { taskId: 't2', specId: 'beta', status: 'failed', error: 'model unavailable' },
        { taskId: 't3', specId: 'gamma', status: 'completed', score: 0.5 },
      ],
    });
    expect(harness.events).toEqual([
      'session:unit',
      'start:t1',
      'complete:t1',
      'start:t2',
      'complete:t2',
      'start:t3',
      'complete:t3',
      'submit:ses-1',
    ]);
  });
});

describe('runSingleTask', () => {
  it('starts the task by spec id and grades it', async () => {
    const harness = new FakeHarness(tasks);
    harness.scores.set('t2', 0);

    const result = await runSingleTask(harness, 'erc3-test', 'beta', async () => outcome('denied'));

    expect(result).toEqual({ taskId: 't2', specId: 'beta', status: 'denied', score: 0 });
    expect(harness.events).toEqual(['start:t2', 'complete:t2']);
  });
});

describe('indent', () => {
  it('prefixes non-empty lines only', () => {
    expect(indent('a\n\nb')).toBe('  a\n\n  b');
  });
});
