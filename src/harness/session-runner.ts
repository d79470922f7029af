/**
 * Session runner
 *
 * Drives a benchmark session task by task. A task that throws is logged
 * and still completed, so one broken task never costs the rest of the
 * session.
 */

import type { RunOutcome, RunStatus, Task } from '../core/agent.js';
import { toTask, type BenchmarkHarness, type SessionMetadata } from './harness.js';
import { logger } from '../utils/logger.js';

export type TaskRunner = (task: Task) => Promise<RunOutcome>;

export interface TaskResult {
  taskId: string;
  specId: string;
  status: RunStatus | 'failed';
  score?: number;
  error?: string;
}

export interface SessionSummary {
  sessionId: string;
  results: TaskResult[];
}

export function indent(text: string, prefix: string = '  '): string {
  return text
    .split('\n')
    .map((line) => (line.length > 0 ? prefix + line : line))
    .join('\n');
}

async function runAndGrade(harness: BenchmarkHarness, task: Task, runTask: TaskRunner): Promise<TaskResult> {
  logger.info('='.repeat(40));
  logger.info(`Starting Task: ${task.taskId} (${task.specId}): ${task.taskText}`);

  await harness.startTask(task);

  const result: TaskResult = { taskId: task.taskId, specId: task.specId, status: 'failed' };
  try {
    const outcome = await runTask(task);
    result.status = outcome.status;
  } catch (error) {
    result.error = error instanceof Error ? error.message : String(error);
    logger.error(`Task ${task.taskId} failed`, error);
  }

  const graded = await harness.completeTask(task);
  if (graded.eval) {
    result.score = graded.eval.score;
    logger.info(`SCORE: ${graded.eval.score}\n${indent(graded.eval.logs)}`);
  }

  return result;
}

export async function runSession(
  harness: BenchmarkHarness,
  runTask: TaskRunner,
  metadata: SessionMetadata
): Promise<SessionSummary> {
  const sessionId = await harness.startSession(metadata);
  const status = await harness.sessionStatus(sessionId);
  logger.info(`Session ${sessionId} has ${status.tasks.length} tasks`);

  const results: TaskResult[] = [];
  for (const info of status.tasks) {
    results.push(await runAndGrade(harness, toTask(info), runTask));
  }

  await harness.submitSession(sessionId);

  const scored = results.filter((r) => r.score !== undefined);
  const total = scored.reduce((sum, r) => sum + (r.score ?? 0), 0);
  logger.success(`Session ${sessionId} submitted: ${total.toFixed(2)} over ${scored.length} graded task(s)`);

  return { sessionId, results };
}

export async function runSingleTask(
  harness: BenchmarkHarness,
  benchmark: string,
  specId: string,
  runTask: TaskRunner
): Promise<TaskResult> {
  const task = await harness.startNewTask(benchmark, specId);
  return runAndGrade(harness, task, runTask);
}
