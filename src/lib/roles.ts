import builtinRoles from '../config/roles.json'
import type { Role } from '../types'
import { ChatEngineError, UnknownRoleError } from './errors'
import { roleListSchema, type RoleInput } from './schemas'

const freezeRole = (role: Role): Role =>
  Object.freeze({ ...role, sampling: Object.freeze({ ...role.sampling }) })

/**
 * Fixed, ordered registry of assistant roles. Built once, never mutated.
 */
export class RoleCatalog {
  private readonly roles: readonly Role[]
  private readonly byId: ReadonlyMap<string, Role>

  constructor(input: readonly RoleInput[]) {
    const parsed = roleListSchema.parse(input)
    const byId = new Map<string, Role>()
    const roles: Role[] = []
    for (const r of parsed) {
      if (byId.has(r.id)) throw new ChatEngineError(`Duplicate role id: ${r.id}`)
      const role = freezeRole(r)
      byId.set(role.id, role)
      roles.push(role)
    }
    this.roles = Object.freeze(roles)
    this.byId = byId
  }

  listRoles(): readonly Role[] {
    return this.roles
  }

  roleById(id: string): Role {
    const role = this.byId.get(id)
    if (!role) throw new UnknownRoleError(id)
    return role
  }

  hasRole(id: string): boolean {
    return this.byId.has(id)
  }
}

export const createDefaultRoleCatalog = (): RoleCatalog => new RoleCatalog(builtinRoles)
