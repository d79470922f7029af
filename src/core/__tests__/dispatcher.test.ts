/**
 * Tests for ActionDispatcher
 */

import { describe, it, expect } from 'vitest';
import { ActionDispatcher, deleteAsUpdate } from '../dispatcher.js';
import { FakeDomainClient, employee, project } from '../../__tests__/fakes.js';
import { DomainApiError } from '../../utils/errors.js';

describe('ActionDispatcher', () => {
  describe('employee updates', () => {
    const stored = employee('jane_doe', {
      notes: 'remote first',
      salary: 90000,
      location: 'Vienna',
      department: 'R&D',
      skills: [{ name: 'go', level: 3 }],
      wills: [{ name: 'rust', level: 2 }],
    });

    it('fills fields the request leaves out from the stored record', async () => {
      const client = new FakeDomainClient({ employees: [stored] });
      const dispatcher = new ActionDispatcher(client);

      await dispatcher.dispatch({ tool: '/employees/update', employee: 'jane_doe', salary: 95000 });

      expect(client.dispatched).toEqual([
        {
          tool: '/employees/update',
          employee: 'jane_doe',
          salary: 95000,
          notes: 'remote first',
          location: 'Vienna',
          department: 'R&D',
          skills: [{ name: 'go', level: 3 }],
          wills: [{ name: 'rust', level: 2 }],
        },
      ]);
    });

    it('treats empty strings, empty lists and zero as unset', async () => {
      const client = new FakeDomainClient({ employees: [stored] });
      const dispatcher = new ActionDispatcher(client);

      const merged = await dispatcher.mergeEmployeeUpdate({
        tool: '/employees/update',
        employee: 'jane_doe',
        notes: '',
        salary: 0,
        skills: [],
        wills: [],
        location: '',
        department: 'Sales',
      });

      expect(merged).toEqual({
        tool: '/employees/update',
        employee: 'jane_doe',
        notes: 'remote first',
        salary: 90000,
        skills: [{ name: 'go', level: 3 }],
        wills: [{ name: 'rust', level: 2 }],
        location: 'Vienna',
        department: 'Sales',
      });
    });

    it('is idempotent when the update is applied twice', async () => {
      const client = new FakeDomainClient({ employees: [stored] });
      const dispatcher = new ActionDispatcher(client);
      const request = { tool: '/employees/update' as const, employee: 'jane_doe', department: 'Sales' };

      const first = await dispatcher.mergeEmployeeUpdate(request);
      const second = await dispatcher.mergeEmployeeUpdate(first);

      expect(second).toEqual(first);
    });

    it('surfaces a missing employee as a service error', async () => {
      const dispatcher = new ActionDispatcher(new FakeDomainClient());

      await expect(
        dispatcher.dispatch({ tool: '/employees/update', employee: 'ghost', notes: 'x' })
      ).rejects.toBeInstanceOf(DomainApiError);
    });
  });

  describe('wiki deletion', () => {
    it('sends an update with empty content', async () => {
      const client = new FakeDomainClient();
      const dispatcher = new ActionDispatcher(client);

      await dispatcher.dispatch({ tool: '/wiki/delete', file: 'old/page.md', changed_by: 'jane_doe' });

      expect(client.dispatched).toEqual([
        { tool: '/wiki/update', file: 'old/page.md', content: '', changed_by: 'jane_doe' },
      ]);
    });

    it('is the same request as an explicit empty update', () => {
      expect(deleteAsUpdate({ tool: '/wiki/delete', file: 'a.md' })).toEqual({
        tool: '/wiki/update',
        file: 'a.md',
        content: '',
        changed_by: undefined,
      });
    });
  });

  describe('responses', () => {
    it('strips links to the current actor', async () => {
      const client = new FakeDomainClient();
      const dispatcher = new ActionDispatcher(client, { currentUser: 'jane_doe' });

      await dispatcher.dispatch({
        tool: '/respond',
        message: 'done',
        outcome: 'ok_answer',
        links: [
          { kind: 'employee', id: 'jane_doe' },
          { kind: 'project', id: 'proj_1' },
        ],
      });

      expect(client.dispatched).toEqual([
        { tool: '/respond', message: 'done', outcome: 'ok_answer', links: [{ kind: 'project', id: 'proj_1' }] },
      ]);
    });

    it('leaves links alone for guests', () => {
      const dispatcher = new ActionDispatcher(new FakeDomainClient());
      const response = {
        tool: '/respond' as const,
        message: 'hi',
        outcome: 'ok_answer' as const,
        links: [{ kind: 'employee' as const, id: 'jane_doe' }],
      };

      expect(dispatcher.withoutSelfLinks(response)).toBe(response);
    });
  });

  describe('aggregated listings', () => {
    it('splits projects by the role the user holds', async () => {
      const p1 = project('p1', [{ employee: 'jane_doe', time_slice: 0.5, role: 'Lead' }]);
      const p2 = project('p2', [
        { employee: 'bob_ray', time_slice: 1, role: 'Lead' },
        { employee: 'jane_doe', time_slice: 0.2, role: 'Engineer' },
      ]);
      const p3 = project('p3', [{ employee: 'bob_ray', time_slice: 1, role: 'QA' }]);
      const p4 = project('p4', [{ employee: 'jane_doe', time_slice: 0.3, role: 'Lead' }]);
      const client = new FakeDomainClient({ projects: [p1, p2, p3, p4] });
      const dispatcher = new ActionDispatcher(client);

      const result = await dispatcher.dispatch({ tool: '/all-projects-for-user', user: 'jane_doe' });

      expect(result).toEqual({ lead_in: [p1, p4], member_of: [p2] });
      expect(client.dispatched).toEqual([]);
    });

    it('backs off the page size when the service rejects it', async () => {
      const client = new FakeDomainClient({
        maxPageSize: 5,
        projects: Array.from({ length: 7 }, (_, i) =>
          project(`p${i}`, [{ employee: 'jane_doe', time_slice: 1, role: 'Engineer' }])
        ),
      });
      const dispatcher = new ActionDispatcher(client);

      const result = await dispatcher.listAllProjectsForUser('jane_doe');

      expect(client.pageRequests).toEqual([
        { offset: 0, limit: 32 },
        { offset: 0, limit: 16 },
        { offset: 0, limit: 8 },
        { offset: 0, limit: 4 },
        { offset: 4, limit: 4 },
      ]);
      expect(result.member_of.map((p) => p.id)).toEqual(['p0', 'p1', 'p2', 'p3', 'p4', 'p5', 'p6']);
      expect(result.lead_in).toEqual([]);
    });

    it('collects customers managed by the user', async () => {
      const client = new FakeDomainClient({
        customers: [
          { id: 'c1', name: 'One', account_manager: 'jane_doe' },
          { id: 'c2', name: 'Two', account_manager: 'bob_ray' },
          { id: 'c3', name: 'Three', account_manager: 'jane_doe' },
        ],
      });
      const dispatcher = new ActionDispatcher(client);

      const result = await dispatcher.dispatch({ tool: '/all-customers-for-user', user: 'jane_doe' });

      expect(result).toEqual({
        customers: [
          { id: 'c1', name: 'One', account_manager: 'jane_doe' },
          { id: 'c3', name: 'Three', account_manager: 'jane_doe' },
        ],
      });
    });
  });

  it('forwards plain actions unchanged', async () => {
    const client = new FakeDomainClient();
    const dispatcher = new ActionDispatcher(client);

    const result = await dispatcher.dispatch({ tool: '/projects/get', id: 'p1' });

    expect(result).toEqual({ ok: true, tool: '/projects/get' });
    expect(client.dispatched).toEqual([{ tool: '/projects/get', id: 'p1' }]);
  });
});
