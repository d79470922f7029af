/**
 * The closed action catalog the model chooses from at every step.
 *
 * Every variant is discriminated by its `tool` path. Remote operations come
 * straight from the service shapes; the agent adds a few of its own
 * (wiki deletion, the two "all X for user" aggregations) and renames some
 * operations so the model stops confusing similarly named ones.
 */

import { z } from 'zod';
import {
  EmployeeIdSchema,
  GetCustomerSchema,
  GetEmployeeSchema,
  GetProjectSchema,
  GetTimeEntrySchema,
  ListCustomersSchema,
  ListEmployeesSchema,
  ListProjectsSchema,
  ListWikiSchema,
  LoadWikiSchema,
  LogTimeEntrySchema,
  ProvideAgentResponseSchema,
  SearchCustomersSchema,
  SearchEmployeesSchema,
  SearchProjectsSchema,
  SearchTimeEntriesSchema,
  SearchWikiSchema,
  TimeSummaryByEmployeeSchema,
  TimeSummaryByProjectSchema,
  UpdateEmployeeInfoSchema,
  UpdateProjectStatusSchema,
  UpdateProjectTeamSchema,
  UpdateTimeEntrySchema,
  UpdateWikiSchema,
} from '../api/schemas.js';

export const DeleteWikiPageSchema = z
  .object({
    tool: z.literal('/wiki/delete'),
    file: z.string(),
    changed_by: EmployeeIdSchema.optional(),
  })
  .describe('Delete a wiki page');

export const ListAllProjectsForUserSchema = z
  .object({
    tool: z.literal('/all-projects-for-user'),
    user: EmployeeIdSchema,
  })
  .describe('Every project the user leads or is a member of, including archived ones');

export const ListAllCustomersForUserSchema = z
  .object({
    tool: z.literal('/all-customers-for-user'),
    user: EmployeeIdSchema,
  })
  .describe('Every customer the user is account manager for');

// Renamed wrappers: identical fields, different name for the model
export const GetTimesheetReportByProjectSchema = TimeSummaryByProjectSchema.describe(
  'GetTimesheetReportByProject: time summary grouped by project'
);
export const CreateTimesheetEntryForUserSchema = LogTimeEntrySchema.describe(
  'CreateTimesheetEntryForUser: log a new time entry on behalf of an employee'
);

export const ACTION_CATALOG = {
  ProvideAgentResponse: ProvideAgentResponseSchema,
  ListProjects: ListProjectsSchema,
  SearchProjects: SearchProjectsSchema,
  ListAllProjectsForUser: ListAllProjectsForUserSchema,
  GetProject: GetProjectSchema,
  UpdateProjectTeam: UpdateProjectTeamSchema,
  UpdateProjectStatus: UpdateProjectStatusSchema,
  ListEmployees: ListEmployeesSchema,
  SearchEmployees: SearchEmployeesSchema,
  GetEmployee: GetEmployeeSchema,
  UpdateEmployeeInfo: UpdateEmployeeInfoSchema,
  ListCustomers: ListCustomersSchema,
  ListAllCustomersForUser: ListAllCustomersForUserSchema,
  GetCustomer: GetCustomerSchema,
  SearchCustomers: SearchCustomersSchema,
  SearchTimeEntries: SearchTimeEntriesSchema,
  GetTimesheetReportByProject: GetTimesheetReportByProjectSchema,
  TimeSummaryByEmployee: TimeSummaryByEmployeeSchema,
  GetTimeEntry: GetTimeEntrySchema,
  CreateTimesheetEntryForUser: CreateTimesheetEntryForUserSchema,
  UpdateTimeEntry: UpdateTimeEntrySchema,
  ListWikiPages: ListWikiSchema,
  LoadWikiPage: LoadWikiSchema,
  SearchWiki: SearchWikiSchema,
  UpdateWikiPage: UpdateWikiSchema,
  DeleteWikiPage: DeleteWikiPageSchema,
} as const;

export type ActionName = keyof typeof ACTION_CATALOG;

export const ActionRequestSchema = z.discriminatedUnion('tool', [
  ProvideAgentResponseSchema,
  ListProjectsSchema,
  SearchProjectsSchema,
  ListAllProjectsForUserSchema,
  GetProjectSchema,
  UpdateProjectTeamSchema,
  UpdateProjectStatusSchema,
  ListEmployeesSchema,
  SearchEmployeesSchema,
  GetEmployeeSchema,
  UpdateEmployeeInfoSchema,
  ListCustomersSchema,
  ListAllCustomersForUserSchema,
  GetCustomerSchema,
  SearchCustomersSchema,
  SearchTimeEntriesSchema,
  GetTimesheetReportByProjectSchema,
  TimeSummaryByEmployeeSchema,
  GetTimeEntrySchema,
  CreateTimesheetEntryForUserSchema,
  UpdateTimeEntrySchema,
  ListWikiSchema,
  LoadWikiSchema,
  SearchWikiSchema,
  UpdateWikiSchema,
  DeleteWikiPageSchema,
]);

export type ActionRequest = z.infer<typeof ActionRequestSchema>;
export type ActionTool = ActionRequest['tool'];
export type DeleteWikiPage = z.infer<typeof DeleteWikiPageSchema>;
export type ListAllProjectsForUser = z.infer<typeof ListAllProjectsForUserSchema>;
export type ListAllCustomersForUser = z.infer<typeof ListAllCustomersForUserSchema>;
export type GetTimesheetReportByProject = z.infer<typeof GetTimesheetReportByProjectSchema>;
export type CreateTimesheetEntryForUser = z.infer<typeof CreateTimesheetEntryForUserSchema>;

/** Actions the agent resolves itself instead of forwarding as-is. */
export type LocalTool = '/wiki/delete' | '/all-projects-for-user' | '/all-customers-for-user';

/** Everything the remote service accepts verbatim. */
export type RemoteRequest = Exclude<ActionRequest, { tool: LocalTool }>;

const ACTION_NAMES: Record<ActionTool, ActionName> = {
  '/respond': 'ProvideAgentResponse',
  '/projects/list': 'ListProjects',
  '/projects/search': 'SearchProjects',
  '/all-projects-for-user': 'ListAllProjectsForUser',
  '/projects/get': 'GetProject',
  '/projects/team/update': 'UpdateProjectTeam',
  '/projects/status/update': 'UpdateProjectStatus',
  '/employees/list': 'ListEmployees',
  '/employees/search': 'SearchEmployees',
  '/employees/get': 'GetEmployee',
  '/employees/update': 'UpdateEmployeeInfo',
  '/customers/list': 'ListCustomers',
  '/all-customers-for-user': 'ListAllCustomersForUser',
  '/customers/get': 'GetCustomer',
  '/customers/search': 'SearchCustomers',
  '/time/search': 'SearchTimeEntries',
  '/time/summary/by-project': 'GetTimesheetReportByProject',
  '/time/summary/by-employee': 'TimeSummaryByEmployee',
  '/time/get': 'GetTimeEntry',
  '/time/log': 'CreateTimesheetEntryForUser',
  '/time/update': 'UpdateTimeEntry',
  '/wiki/list': 'ListWikiPages',
  '/wiki/load': 'LoadWikiPage',
  '/wiki/search': 'SearchWiki',
  '/wiki/update': 'UpdateWikiPage',
  '/wiki/delete': 'DeleteWikiPage',
};

export function actionName(request: ActionRequest): ActionName {
  return ACTION_NAMES[request.tool];
}

export function isTerminal(
  request: ActionRequest
): request is Extract<ActionRequest, { tool: '/respond' }> {
  return request.tool === '/respond';
}
