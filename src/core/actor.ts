import type { DomainClient } from '../api/client.js';
import type { EmployeeDetail, WhoAmI } from '../api/schemas.js';

export type Actor =
  | { kind: 'guest' }
  | { kind: 'employee'; profile: EmployeeDetail };

/**
 * Guest for public sessions; otherwise the employee record with `skills`
 * and `wills` cleared.
 */
export async function resolveActor(client: DomainClient, about: WhoAmI): Promise<Actor> {
  if (about.is_public || !about.current_user) {
    return { kind: 'guest' };
  }

  const employee = await client.getEmployee(about.current_user);
  return {
    kind: 'employee',
    profile: { ...employee, skills: [], wills: [] },
  };
}

export function actorId(actor: Actor): string | null {
  return actor.kind === 'employee' ? actor.profile.id : null;
}
