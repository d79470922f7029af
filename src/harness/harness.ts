/**
 * Benchmark harness client
 *
 * The harness owns sessions and tasks: it hands out tasks, grades the
 * agent's final response and records the session score.
 */

import { z } from 'zod';
import { joinUrl, postJson } from '../api/http.js';
import type { Task } from '../core/agent.js';

export const TaskInfoSchema = z.object({
  task_id: z.string(),
  spec_id: z.string(),
  task_text: z.string(),
});

export const StartSessionResponseSchema = z.object({
  session_id: z.string(),
});

export const SessionStatusSchema = z.object({
  session_id: z.string(),
  status: z.string().optional(),
  tasks: z.array(TaskInfoSchema),
});

export const CompleteTaskResponseSchema = z.object({
  eval: z
    .object({
      score: z.number(),
      logs: z.string().default(''),
    })
    .nullable()
    .optional(),
});

const EmptyResponseSchema = z.object({}).passthrough();

export type TaskInfo = z.infer<typeof TaskInfoSchema>;
export type SessionStatus = z.infer<typeof SessionStatusSchema>;
export type CompleteTaskResponse = z.infer<typeof CompleteTaskResponseSchema>;

export interface SessionMetadata {
  benchmark: string;
  workspace: string;
  name: string;
  architecture: string;
}

export interface BenchmarkHarness {
  startSession(metadata: SessionMetadata): Promise<string>;
  sessionStatus(sessionId: string): Promise<SessionStatus>;
  /** Debugging path: start a fresh task of one spec outside any session. */
  startNewTask(benchmark: string, specId: string): Promise<Task>;
  startTask(task: Task): Promise<void>;
  completeTask(task: Task): Promise<CompleteTaskResponse>;
  submitSession(sessionId: string): Promise<void>;
}

export function toTask(info: TaskInfo): Task {
  return { taskId: info.task_id, specId: info.spec_id, taskText: info.task_text };
}

export interface HttpBenchmarkHarnessConfig {
  baseUrl: string;
  apiKey?: string;
}

export class HttpBenchmarkHarness implements BenchmarkHarness {
  private config: HttpBenchmarkHarnessConfig;

  constructor(config: HttpBenchmarkHarnessConfig) {
    this.config = config;
  }

  async startSession(metadata: SessionMetadata): Promise<string> {
    const response = await this.post('/sessions/start', metadata, StartSessionResponseSchema);
    return response.session_id;
  }

  async sessionStatus(sessionId: string): Promise<SessionStatus> {
    return this.post('/sessions/status', { session_id: sessionId }, SessionStatusSchema);
  }

  async startNewTask(benchmark: string, specId: string): Promise<Task> {
    const info = await this.post('/tasks/new', { benchmark, spec_id: specId }, TaskInfoSchema);
    return toTask(info);
  }

  async startTask(task: Task): Promise<void> {
    await this.post('/tasks/start', { task_id: task.taskId }, EmptyResponseSchema);
  }

  async completeTask(task: Task): Promise<CompleteTaskResponse> {
    return this.post('/tasks/complete', { task_id: task.taskId }, CompleteTaskResponseSchema);
  }

  async submitSession(sessionId: string): Promise<void> {
    await this.post('/sessions/submit', { session_id: sessionId }, EmptyResponseSchema);
  }

  private async post<S extends z.ZodTypeAny>(path: string, body: object, schema: S): Promise<z.infer<S>> {
    return postJson(joinUrl(this.config.baseUrl, path), body, schema, { apiKey: this.config.apiKey });
  }
}
