import type { Condition, ConditionStatus } from './types'

export const CONDITION_NETWORK_INTERFACES_VALID = 'NetworkInterfacesValid'

export function findCondition(conditions: Condition[], type: string): Condition | undefined {
  return conditions.find(c => c.type === type)
}

// Sets or replaces a condition in place. lastTransitionTime only moves when the status flips.
export function setCondition(
  conditions: Condition[],
  next: { type: string; status: ConditionStatus; reason: string; message: string },
  now: Date = new Date(),
): void {
  const existing = findCondition(conditions, next.type)
  if (!existing) {
    conditions.push({ ...next, lastTransitionTime: now.toISOString() })
    return
  }

  if (existing.status !== next.status) {
    existing.lastTransitionTime = now.toISOString()
  }
  existing.status = next.status
  existing.reason = next.reason
  existing.message = next.message
}

// Removes a condition in place, returns whether one was present
export function removeCondition(conditions: Condition[], type: string): boolean {
  const index = conditions.findIndex(c => c.type === type)
  if (index === -1) return false
  conditions.splice(index, 1)
  return true
}

export function isConditionTrue(conditions: Condition[], type: string): boolean {
  return findCondition(conditions, type)?.status === 'True'
}
