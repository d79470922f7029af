/**
 * Wire shapes of the company-management service.
 *
 * Requests are what the agent may send (each carries its `tool` path);
 * responses are validated on arrival so the rest of the code works with
 * typed records instead of raw JSON.
 */

import { z } from 'zod';

// ─────────────────────────────────────────────────────────────
// Entities
// ─────────────────────────────────────────────────────────────

export const EmployeeIdSchema = z.string().describe('employee id, e.g. "jane_doe"');

export const SkillLevelSchema = z.object({
  name: z.string(),
  level: z.number().int(),
});

export const ProjectTeamMemberSchema = z.object({
  employee: EmployeeIdSchema,
  time_slice: z.number(),
  role: z.string().describe('Lead, Engineer, Designer, QA, Ops or Other'),
});

export const ProjectBriefSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    customer: z.string(),
    status: z.string(),
  })
  .passthrough();

export const ProjectDetailSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    description: z.string().optional(),
    customer: z.string(),
    status: z.string(),
    team: z.array(ProjectTeamMemberSchema),
  })
  .passthrough();

export const EmployeeBriefSchema = z
  .object({
    id: EmployeeIdSchema,
    name: z.string(),
    email: z.string().optional(),
    location: z.string().optional(),
    department: z.string().optional(),
  })
  .passthrough();

export const EmployeeDetailSchema = z
  .object({
    id: EmployeeIdSchema,
    name: z.string(),
    email: z.string().optional(),
    salary: z.number().optional(),
    notes: z.string().optional(),
    location: z.string().optional(),
    department: z.string().optional(),
    skills: z.array(SkillLevelSchema).default([]),
    wills: z.array(SkillLevelSchema).default([]),
  })
  .passthrough();

export const CompanyBriefSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    location: z.string().optional(),
    deal_phase: z.string().optional(),
  })
  .passthrough();

export const CompanyDetailSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    brief: z.string().optional(),
    location: z.string().optional(),
    deal_phase: z.string().optional(),
    high_level_status: z.string().optional(),
    account_manager: EmployeeIdSchema.optional(),
  })
  .passthrough();

// ─────────────────────────────────────────────────────────────
// Requests
// ─────────────────────────────────────────────────────────────

const page = {
  offset: z.number().int().nonnegative(),
  limit: z.number().int().positive(),
};

export const LinkKindSchema = z.enum(['employee', 'customer', 'project', 'wiki', 'location']);

export const AgentLinkSchema = z.object({
  kind: LinkKindSchema,
  id: z.string(),
});

export const OutcomeSchema = z.enum([
  'ok_answer',
  'ok_not_found',
  'denied_security',
  'none_clarification_needed',
  'none_unsupported',
  'error_internal',
]);

export const ProvideAgentResponseSchema = z.object({
  tool: z.literal('/respond'),
  message: z.string(),
  outcome: OutcomeSchema,
  links: z.array(AgentLinkSchema),
});

export const ListProjectsSchema = z.object({
  tool: z.literal('/projects/list'),
  ...page,
});

export const SearchProjectsSchema = z.object({
  tool: z.literal('/projects/search'),
  query: z.string().optional(),
  customer_id: z.string().optional(),
  status: z.array(z.string()).optional(),
  team: z
    .object({
      employee_id: EmployeeIdSchema,
      role: z.string().optional(),
    })
    .optional(),
  include_archived: z.boolean().optional(),
  ...page,
});

export const GetProjectSchema = z.object({
  tool: z.literal('/projects/get'),
  id: z.string(),
});

export const UpdateProjectTeamSchema = z.object({
  tool: z.literal('/projects/team/update'),
  id: z.string(),
  team: z.array(ProjectTeamMemberSchema),
  changed_by: EmployeeIdSchema.optional(),
});

export const UpdateProjectStatusSchema = z.object({
  tool: z.literal('/projects/status/update'),
  id: z.string(),
  status: z.enum(['idea', 'exploring', 'active', 'paused', 'archived']),
  changed_by: EmployeeIdSchema.optional(),
});

export const ListEmployeesSchema = z.object({
  tool: z.literal('/employees/list'),
  ...page,
});

export const SearchEmployeesSchema = z.object({
  tool: z.literal('/employees/search'),
  query: z.string().optional(),
  location: z.string().optional(),
  department: z.string().optional(),
  manager: EmployeeIdSchema.optional(),
  ...page,
});

export const GetEmployeeSchema = z.object({
  tool: z.literal('/employees/get'),
  id: EmployeeIdSchema,
});

export const UpdateEmployeeInfoSchema = z.object({
  tool: z.literal('/employees/update'),
  employee: EmployeeIdSchema,
  notes: z.string().optional(),
  salary: z.number().optional(),
  skills: z.array(SkillLevelSchema).optional(),
  wills: z.array(SkillLevelSchema).optional(),
  location: z.string().optional(),
  department: z.string().optional(),
  changed_by: EmployeeIdSchema.optional(),
});

export const ListCustomersSchema = z.object({
  tool: z.literal('/customers/list'),
  ...page,
});

export const GetCustomerSchema = z.object({
  tool: z.literal('/customers/get'),
  id: z.string(),
});

export const SearchCustomersSchema = z.object({
  tool: z.literal('/customers/search'),
  query: z.string().optional(),
  deal_phase: z.array(z.string()).optional(),
  account_managers: z.array(EmployeeIdSchema).optional(),
  locations: z.array(z.string()).optional(),
  ...page,
});

export const SearchTimeEntriesSchema = z.object({
  tool: z.literal('/time/search'),
  employee: EmployeeIdSchema.optional(),
  customer: z.string().optional(),
  project: z.string().optional(),
  date_from: z.string().optional(),
  date_to: z.string().optional(),
  billable: z.enum(['', 'billable', 'non_billable']).optional(),
  status: z.enum(['', 'draft', 'submitted', 'approved', 'invoiced', 'voided']).optional(),
  ...page,
});

const timeSummaryFilter = {
  date_from: z.string(),
  date_to: z.string(),
  customers: z.array(z.string()).optional(),
  projects: z.array(z.string()).optional(),
  employees: z.array(EmployeeIdSchema).optional(),
  billable: z.enum(['', 'billable', 'non_billable']).optional(),
};

export const TimeSummaryByProjectSchema = z.object({
  tool: z.literal('/time/summary/by-project'),
  ...timeSummaryFilter,
});

export const TimeSummaryByEmployeeSchema = z.object({
  tool: z.literal('/time/summary/by-employee'),
  ...timeSummaryFilter,
});

export const GetTimeEntrySchema = z.object({
  tool: z.literal('/time/get'),
  id: z.string(),
});

const timeEntryFields = {
  date: z.string().describe('YYYY-MM-DD'),
  hours: z.number(),
  work_category: z.string(),
  notes: z.string(),
  billable: z.boolean(),
  status: z.enum(['draft', 'submitted', 'approved', 'invoiced', 'voided']),
};

export const LogTimeEntrySchema = z.object({
  tool: z.literal('/time/log'),
  employee: EmployeeIdSchema,
  customer: z.string().optional(),
  project: z.string().optional(),
  ...timeEntryFields,
  logged_by: EmployeeIdSchema,
});

export const UpdateTimeEntrySchema = z.object({
  tool: z.literal('/time/update'),
  id: z.string(),
  ...timeEntryFields,
  changed_by: EmployeeIdSchema,
});

export const ListWikiSchema = z.object({
  tool: z.literal('/wiki/list'),
});

export const LoadWikiSchema = z.object({
  tool: z.literal('/wiki/load'),
  file: z.string(),
});

export const SearchWikiSchema = z.object({
  tool: z.literal('/wiki/search'),
  query_regex: z.string(),
});

export const UpdateWikiSchema = z.object({
  tool: z.literal('/wiki/update'),
  file: z.string(),
  content: z.string(),
  changed_by: EmployeeIdSchema.optional(),
});

// ─────────────────────────────────────────────────────────────
// Responses
// ─────────────────────────────────────────────────────────────

export const WhoAmISchema = z.object({
  current_user: EmployeeIdSchema.nullable().optional(),
  is_public: z.boolean(),
  location: z.string().nullable().optional(),
  department: z.string().nullable().optional(),
  today: z.string(),
  wiki_sha1: z.string().optional(),
});

export const SearchProjectsResponseSchema = z.object({
  projects: z.array(ProjectBriefSchema).nullable().optional(),
  next_offset: z.number().int(),
});

export const GetProjectResponseSchema = z.object({
  project: ProjectDetailSchema,
});

export const SearchCustomersResponseSchema = z.object({
  companies: z.array(CompanyBriefSchema).nullable().optional(),
  next_offset: z.number().int(),
});

export const GetCustomerResponseSchema = z.object({
  company: CompanyDetailSchema,
});

export const GetEmployeeResponseSchema = z.object({
  employee: EmployeeDetailSchema,
});

export const ListWikiResponseSchema = z.object({
  paths: z.array(z.string()),
  sha1: z.string().optional(),
});

export const LoadWikiResponseSchema = z.object({
  file: z.string(),
  content: z.string(),
});

export const ApiErrorBodySchema = z.object({
  error: z.string(),
  code: z.string().optional(),
});

export const JsonObjectSchema = z.record(z.unknown());

export type SkillLevel = z.infer<typeof SkillLevelSchema>;
export type ProjectTeamMember = z.infer<typeof ProjectTeamMemberSchema>;
export type ProjectBrief = z.infer<typeof ProjectBriefSchema>;
export type ProjectDetail = z.infer<typeof ProjectDetailSchema>;
export type EmployeeDetail = z.infer<typeof EmployeeDetailSchema>;
export type CompanyBrief = z.infer<typeof CompanyBriefSchema>;
export type CompanyDetail = z.infer<typeof CompanyDetailSchema>;
export type AgentLink = z.infer<typeof AgentLinkSchema>;
export type Outcome = z.infer<typeof OutcomeSchema>;
export type WhoAmI = z.infer<typeof WhoAmISchema>;
export type SearchProjectsResponse = z.infer<typeof SearchProjectsResponseSchema>;
export type SearchCustomersResponse = z.infer<typeof SearchCustomersResponseSchema>;
export type ListWikiResponse = z.infer<typeof ListWikiResponseSchema>;
export type JsonObject = z.infer<typeof JsonObjectSchema>;

export type ProvideAgentResponse = z.infer<typeof ProvideAgentResponseSchema>;
export type SearchProjectsRequest = z.infer<typeof SearchProjectsSchema>;
export type SearchCustomersRequest = z.infer<typeof SearchCustomersSchema>;
export type UpdateEmployeeInfoRequest = z.infer<typeof UpdateEmployeeInfoSchema>;
export type UpdateWikiRequest = z.infer<typeof UpdateWikiSchema>;
