/**
 * Action Dispatcher
 *
 * Executes one ActionRequest against the remote service. Most actions are
 * forwarded unchanged; a few are rewritten or assembled from several calls.
 * Remote errors are not caught here.
 */

import type { DomainClient } from '../api/client.js';
import type {
  CompanyDetail,
  JsonObject,
  ProjectDetail,
  ProvideAgentResponse,
  UpdateEmployeeInfoRequest,
  UpdateWikiRequest,
} from '../api/schemas.js';
import type { ActionRequest, DeleteWikiPage } from '../contract/actions.js';
import { aggregatePages } from './pagination.js';

export type AllProjectsForUser = {
  lead_in: ProjectDetail[];
  member_of: ProjectDetail[];
};

export type AllCustomersForUser = {
  customers: CompanyDetail[];
};

export interface DispatcherOptions {
  /** Identifier of the actor the run acts for; null for guests. */
  currentUser?: string | null;
  initialPageSize?: number;
}

export class ActionDispatcher {
  private client: DomainClient;
  private currentUser: string | null;
  private initialPageSize?: number;

  constructor(client: DomainClient, options: DispatcherOptions = {}) {
    this.client = client;
    this.currentUser = options.currentUser ?? null;
    this.initialPageSize = options.initialPageSize;
  }

  async dispatch(request: ActionRequest): Promise<JsonObject> {
    switch (request.tool) {
      case '/respond':
        return this.client.dispatch(this.withoutSelfLinks(request));

      case '/employees/update':
        return this.client.dispatch(await this.mergeEmployeeUpdate(request));

      case '/wiki/delete':
        return this.client.dispatch(deleteAsUpdate(request));

      case '/all-projects-for-user':
        return this.listAllProjectsForUser(request.user);

      case '/all-customers-for-user':
        return this.listAllCustomersForUser(request.user);

      case '/projects/list':
      case '/projects/search':
      case '/projects/get':
      case '/projects/team/update':
      case '/projects/status/update':
      case '/employees/list':
      case '/employees/search':
      case '/employees/get':
      case '/customers/list':
      case '/customers/get':
      case '/customers/search':
      case '/time/search':
      case '/time/summary/by-project':
      case '/time/summary/by-employee':
      case '/time/get':
      case '/time/log':
      case '/time/update':
      case '/wiki/list':
      case '/wiki/load':
      case '/wiki/search':
      case '/wiki/update':
        return this.client.dispatch(request);

      default:
        return assertNever(request);
    }
  }

  /** The agent never links to the actor it is answering. */
  withoutSelfLinks(request: ProvideAgentResponse): ProvideAgentResponse {
    if (!this.currentUser) {
      return request;
    }
    return {
      ...request,
      links: request.links.filter((link) => link.id !== this.currentUser),
    };
  }

  /**
   * Fill every field the model left unset from the stored record so a partial
   * update erases nothing. Empty strings, empty lists and zero count as unset.
   */
  async mergeEmployeeUpdate(request: UpdateEmployeeInfoRequest): Promise<UpdateEmployeeInfoRequest> {
    const current = await this.client.getEmployee(request.employee);

    return {
      ...request,
      notes: orStored(request.notes, current.notes),
      salary: orStored(request.salary, current.salary),
      skills: orStored(request.skills, current.skills),
      wills: orStored(request.wills, current.wills),
      location: orStored(request.location, current.location),
      department: orStored(request.department, current.department),
    };
  }

  async listAllProjectsForUser(user: string): Promise<AllProjectsForUser> {
    const buckets = await aggregatePages({
      initialPageSize: this.initialPageSize,
      fetchPage: async ({ offset, limit }) => {
        const page = await this.client.searchProjects({
          offset,
          limit,
          include_archived: true,
          team: { employee_id: user },
        });
        return { items: page.projects ?? [], nextOffset: page.next_offset };
      },
      fetchDetail: (summary) => this.client.getProject(summary.id),
      partition: (detail) => {
        const member = detail.team.find((entry) => entry.employee === user);
        return member?.role === 'Lead' ? 'lead_in' : 'member_of';
      },
    });

    return {
      lead_in: buckets.get('lead_in') ?? [],
      member_of: buckets.get('member_of') ?? [],
    };
  }

  async listAllCustomersForUser(user: string): Promise<AllCustomersForUser> {
    const buckets = await aggregatePages({
      initialPageSize: this.initialPageSize,
      fetchPage: async ({ offset, limit }) => {
        const page = await this.client.searchCustomers({
          offset,
          limit,
          account_managers: [user],
        });
        return { items: page.companies ?? [], nextOffset: page.next_offset };
      },
      fetchDetail: (summary) => this.client.getCustomer(summary.id),
      partition: () => 'customers',
    });

    return {
      customers: buckets.get('customers') ?? [],
    };
  }
}

/** A deleted page is a page with no content. */
function isUnset(value: string | number | readonly unknown[] | null | undefined): boolean {
  if (value === undefined || value === null) {
    return true;
  }
  if (Array.isArray(value) || typeof value === 'string') {
    return value.length === 0;
  }
  return value === 0;
}

function orStored<T extends string | number | readonly unknown[]>(
  given: T | undefined,
  stored: T | undefined
): T | undefined {
  return isUnset(given) ? stored : given;
}

export function deleteAsUpdate(request: DeleteWikiPage): UpdateWikiRequest {
  return {
    tool: '/wiki/update',
    file: request.file,
    content: '',
    changed_by: request.changed_by,
  };
}

function assertNever(value: never): never {
  throw new Error(`Unhandled action: ${JSON.stringify(value)}`);
}
