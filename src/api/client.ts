/**
 * Company-management service client
 *
 * DomainClient is the seam the agent talks through; HttpDomainClient is the
 * production implementation, tests substitute an in-memory fake.
 */

import type { z } from 'zod';
import {
  GetCustomerResponseSchema,
  GetEmployeeResponseSchema,
  GetProjectResponseSchema,
  JsonObjectSchema,
  ListWikiResponseSchema,
  LoadWikiResponseSchema,
  SearchCustomersResponseSchema,
  SearchProjectsResponseSchema,
  WhoAmISchema,
  type CompanyDetail,
  type EmployeeDetail,
  type JsonObject,
  type ListWikiResponse,
  type ProjectDetail,
  type SearchCustomersRequest,
  type SearchCustomersResponse,
  type SearchProjectsRequest,
  type SearchProjectsResponse,
  type WhoAmI,
} from './schemas.js';
import type { RemoteRequest } from '../contract/actions.js';
import { joinUrl, postJson } from './http.js';

export type Body<R extends { tool: string }> = Omit<R, 'tool'>;

export interface DomainClient {
  whoAmI(): Promise<WhoAmI>;
  searchProjects(request: Body<SearchProjectsRequest>): Promise<SearchProjectsResponse>;
  getProject(id: string): Promise<ProjectDetail>;
  searchCustomers(request: Body<SearchCustomersRequest>): Promise<SearchCustomersResponse>;
  getCustomer(id: string): Promise<CompanyDetail>;
  getEmployee(id: string): Promise<EmployeeDetail>;
  listWiki(): Promise<ListWikiResponse>;
  loadWiki(file: string): Promise<string>;
  /** Forward any request the service understands verbatim. */
  dispatch(request: RemoteRequest): Promise<JsonObject>;
}

export interface HttpDomainClientConfig {
  /** Service root, e.g. `https://bench.example.test/api` */
  baseUrl: string;
  /** Task the calls are scoped to; becomes the first path segment. */
  taskId: string;
  apiKey?: string;
}

export class HttpDomainClient implements DomainClient {
  private config: HttpDomainClientConfig;

  constructor(config: HttpDomainClientConfig) {
    this.config = config;
  }

  async whoAmI(): Promise<WhoAmI> {
    return this.post('/whoami', {}, WhoAmISchema);
  }

  async searchProjects(request: Body<SearchProjectsRequest>): Promise<SearchProjectsResponse> {
    return this.post('/projects/search', request, SearchProjectsResponseSchema);
  }

  async getProject(id: string): Promise<ProjectDetail> {
    const response = await this.post('/projects/get', { id }, GetProjectResponseSchema);
    return response.project;
  }

  async searchCustomers(request: Body<SearchCustomersRequest>): Promise<SearchCustomersResponse> {
    return this.post('/customers/search', request, SearchCustomersResponseSchema);
  }

  async getCustomer(id: string): Promise<CompanyDetail> {
    const response = await this.post('/customers/get', { id }, GetCustomerResponseSchema);
    return response.company;
  }

  async getEmployee(id: string): Promise<EmployeeDetail> {
    const response = await this.post('/employees/get', { id }, GetEmployeeResponseSchema);
    return response.employee;
  }

  async listWiki(): Promise<ListWikiResponse> {
    return this.post('/wiki/list', {}, ListWikiResponseSchema);
  }

  async loadWiki(file: string): Promise<string> {
    const response = await this.post('/wiki/load', { file }, LoadWikiResponseSchema);
    return response.content;
  }

  async dispatch(request: RemoteRequest): Promise<JsonObject> {
    const { tool, ...body } = request;
    return this.post(tool, body, JsonObjectSchema);
  }

  private async post<S extends z.ZodTypeAny>(path: string, body: object, schema: S): Promise<z.infer<S>> {
    const url = joinUrl(this.config.baseUrl, encodeURIComponent(this.config.taskId), path);
    return postJson(url, body, schema, { apiKey: this.config.apiKey });
  }
}
