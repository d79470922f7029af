/**
 * In-process stand-ins for the model, the company service and the benchmark harness.
 */

import type { z } from 'zod';
import type { Body, DomainClient } from '../api/client.js';
import type {
  CompanyDetail,
  EmployeeDetail,
  JsonObject,
  ListWikiResponse,
  ProjectDetail,
  SearchCustomersRequest,
  SearchCustomersResponse,
  SearchProjectsRequest,
  SearchProjectsResponse,
  WhoAmI,
} from '../api/schemas.js';
import type { RemoteRequest } from '../contract/actions.js';
import type { Task } from '../core/agent.js';
import type { Message } from '../models/base.js';
import type { OutputContract, StructuredModel } from '../models/structured.js';
import type { BenchmarkHarness, CompleteTaskResponse, SessionMetadata, SessionStatus } from '../harness/harness.js';
import type { DistilledKnowledge } from '../knowledge/types.js';
import { DomainApiError } from '../utils/errors.js';

export interface RecordedQuery {
  contract: string;
  messages: Message[];
}

/**
 * Replays raw outputs per contract name and validates them through the
 * contract, so malformed scripts fail the same way real model output does.
 */
export class ScriptedModel implements StructuredModel {
  readonly queries: RecordedQuery[] = [];
  private scripts = new Map<string, unknown[]>();

  script(contractName: string, ...outputs: unknown[]): this {
    const queue = this.scripts.get(contractName) ?? [];
    queue.push(...outputs);
    this.scripts.set(contractName, queue);
    return this;
  }

  /** Repeat one output forever. */
  always(contractName: string, output: unknown): this {
    return this.script(contractName, ...Array.from({ length: 100 }, () => output));
  }

  async query<S extends z.ZodTypeAny>(messages: readonly Message[], contract: OutputContract<S>): Promise<z.infer<S>> {
    this.queries.push({ contract: contract.name, messages: messages.map((m) => ({ ...m })) });
    const queue = this.scripts.get(contract.name);
    if (!queue || queue.length === 0) {
      throw new Error(`No scripted output left for ${contract.name}`);
    }
    return contract.parse(queue.shift());
  }

  count(contractName: string): number {
    return this.queries.filter((q) => q.contract === contractName).length;
  }
}

export interface FakeDomainData {
  whoAmI?: WhoAmI;
  employees?: EmployeeDetail[];
  projects?: ProjectDetail[];
  customers?: CompanyDetail[];
  wiki?: Record<string, string>;
  /** Largest page the fake accepts before answering "page limit exceeded". */
  maxPageSize?: number;
}

export class FakeDomainClient implements DomainClient {
  readonly dispatched: RemoteRequest[] = [];
  readonly pageRequests: { offset: number; limit: number }[] = [];
  readonly failures = new Map<string, DomainApiError>();
  wikiListCalls = 0;

  private about: WhoAmI;
  private employees: Map<string, EmployeeDetail>;
  private projects: ProjectDetail[];
  private customers: CompanyDetail[];
  private wiki: Record<string, string>;
  private maxPageSize: number;

  constructor(data: FakeDomainData = {}) {
    this.about = data.whoAmI ?? { is_public: true, today: '2025-03-01' };
    this.employees = new Map((data.employees ?? []).map((e) => [e.id, e]));
    this.projects = data.projects ?? [];
    this.customers = data.customers ?? [];
    this.wiki = data.wiki ?? {};
    this.maxPageSize = data.maxPageSize ?? Number.MAX_SAFE_INTEGER;
  }

  failOn(tool: string, error: DomainApiError): this {
    this.failures.set(tool, error);
    return this;
  }

  async whoAmI(): Promise<WhoAmI> {
    return this.about;
  }

  async searchProjects(request: Body<SearchProjectsRequest>): Promise<SearchProjectsResponse> {
    this.checkPage(request);
    const matching = this.projects.filter(
      (p) => !request.team || p.team.some((m) => m.employee === request.team?.employee_id)
    );
    const { items, next } = slice(matching, request.offset, request.limit);
    return {
      projects: items.map((p) => ({ id: p.id, name: p.name, customer: p.customer, status: p.status })),
      next_offset: next,
    };
  }

  async getProject(id: string): Promise<ProjectDetail> {
    const project = this.projects.find((p) => p.id === id);
    if (!project) {
      throw new DomainApiError(`project ${id} not found`, 'not_found', 404);
    }
    return project;
  }

  async searchCustomers(request: Body<SearchCustomersRequest>): Promise<SearchCustomersResponse> {
    this.checkPage(request);
    const managers = request.account_managers;
    const matching = this.customers.filter(
      (c) => !managers || (c.account_manager !== undefined && managers.includes(c.account_manager))
    );
    const { items, next } = slice(matching, request.offset, request.limit);
    return {
      companies: items.map((c) => ({ id: c.id, name: c.name })),
      next_offset: next,
    };
  }

  async getCustomer(id: string): Promise<CompanyDetail> {
    const customer = this.customers.find((c) => c.id === id);
    if (!customer) {
      throw new DomainApiError(`customer ${id} not found`, 'not_found', 404);
    }
    return customer;
  }

  async getEmployee(id: string): Promise<EmployeeDetail> {
    const employee = this.employees.get(id);
    if (!employee) {
      throw new DomainApiError(`employee ${id} not found`, 'not_found', 404);
    }
    return employee;
  }

  async listWiki(): Promise<ListWikiResponse> {
    this.wikiListCalls++;
    return { paths: Object.keys(this.wiki) };
  }

  async loadWiki(file: string): Promise<string> {
    const content = this.wiki[file];
    if (content === undefined) {
      throw new DomainApiError(`page ${file} not found`, 'not_found', 404);
    }
    return content;
  }

  async dispatch(request: RemoteRequest): Promise<JsonObject> {
    this.dispatched.push(request);
    const failure = this.failures.get(request.tool);
    if (failure) {
      throw failure;
    }
    return { ok: true, tool: request.tool };
  }

  private checkPage(request: { offset: number; limit: number }): void {
    this.pageRequests.push({ offset: request.offset, limit: request.limit });
    if (request.limit > this.maxPageSize) {
      throw new DomainApiError(`page limit exceeded: ${request.limit} > ${this.maxPageSize}`, 'bad_request', 400);
    }
  }
}

function slice<T>(items: readonly T[], offset: number, limit: number): { items: T[]; next: number } {
  const end = offset + limit;
  return { items: items.slice(offset, end), next: end < items.length ? end : -1 };
}

export class FakeHarness implements BenchmarkHarness {
  readonly events: string[] = [];
  scores = new Map<string, number>();

  constructor(private tasks: Task[]) {}

  async startSession(metadata: SessionMetadata): Promise<string> {
    this.events.push(`session:${metadata.name}`);
    return 'ses-1';
  }

  async sessionStatus(sessionId: string): Promise<SessionStatus> {
    return {
      session_id: sessionId,
      tasks: this.tasks.map((t) => ({ task_id: t.taskId, spec_id: t.specId, task_text: t.taskText })),
    };
  }

  async startNewTask(_benchmark: string, specId: string): Promise<Task> {
    const task = this.tasks.find((t) => t.specId === specId);
    if (!task) {
      throw new Error(`unknown spec ${specId}`);
    }
    return task;
  }

  async startTask(task: Task): Promise<void> {
    this.events.push(`start:${task.taskId}`);
  }

  async completeTask(task: Task): Promise<CompleteTaskResponse> {
    this.events.push(`complete:${task.taskId}`);
    const score = this.scores.get(task.taskId);
    return { eval: score === undefined ? null : { score, logs: 'graded' } };
  }

  async submitSession(sessionId: string): Promise<void> {
    this.events.push(`submit:${sessionId}`);
  }
}

export function employee(id: string, overrides: Partial<EmployeeDetail> = {}): EmployeeDetail {
  return {
    id,
    name: id.replace('_', ' '),
    skills: [],
    wills: [],
    ...overrides,
  };
}

export function project(id: string, team: ProjectDetail['team']): ProjectDetail {
  return { id, name: `Project ${id}`, customer: 'cust_1', status: 'active', team };
}

export const KNOWLEDGE: DistilledKnowledge = {
  company_name: 'Acme Test Works',
  company_locations: ['Vienna', 'Munich'],
  company_execs: ['ceo_one'],
  rules: [
    { why_relevant_summary: 'privacy', category: 'applies_to_guests', compact_rule: 'Guests MUST NOT see salaries' },
    { why_relevant_summary: 'audit', category: 'applies_to_users', compact_rule: 'Users MAY edit own notes' },
    { why_relevant_summary: 'general', category: 'other', compact_rule: 'Always link entities' },
  ],
};
