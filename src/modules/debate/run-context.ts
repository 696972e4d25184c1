/**
 * RunContext: state shared by the stages of one debate run.
 *
 * Holds the run id and the role map. Roles are written once by the
 * role-assignment stage and read-only afterwards.
 */

import { StateTransitionError } from '../../core/errors.js'
import type { Role } from './types.js'

export class RunContext {
  readonly runId: string
  private _roles: ReadonlyMap<string, Role> | null = null

  constructor(runId: string) {
    this.runId = runId
  }

  get rolesAssigned(): boolean {
    return this._roles !== null
  }

  /**
   * Freeze the role map. Iteration order of `roles` is kept.
   *
   * @throws {StateTransitionError} when roles were already assigned
   */
  assignRoles(roles: ReadonlyMap<string, Role>): void {
    if (this._roles !== null) {
      throw new StateTransitionError(`Roles already assigned for run ${this.runId}`, {
        runId: this.runId,
      })
    }
    this._roles = new Map(roles)
  }

  roleOf(agentId: string): Role | undefined {
    return this._roles?.get(agentId)
  }

  get judgeId(): string | undefined {
    for (const [agentId, role] of this._roles ?? []) {
      if (role === 'Judge') return agentId
    }
    return undefined
  }

  get solverIds(): string[] {
    const ids: string[] = []
    for (const [agentId, role] of this._roles ?? []) {
      if (role === 'Solver') ids.push(agentId)
    }
    return ids
  }

  /** Plain-object snapshot of the role map */
  finalRoles(): Record<string, Role> {
    return Object.fromEntries(this._roles ?? [])
  }
}
