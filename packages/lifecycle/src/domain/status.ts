import { hasCapability } from './capabilities.js';
import type { LifecycleStatus, RosterEntity } from './types.js';

/**
 * Derive the single lifecycle state of an entity from its status predicates.
 * Predicates of capabilities the entity does not declare are ignored.
 */
export function resolveStatus(entity: RosterEntity): LifecycleStatus {
  if (hasCapability(entity, 'retirement') && entity.isRetired()) {
    return 'retired';
  }

  if (!hasCapability(entity, 'employment')) {
    return 'unemployed';
  }

  if (entity.isEmployed()) {
    if (hasCapability(entity, 'injury') && entity.isInjured()) {
      return 'injured';
    }
    if (hasCapability(entity, 'suspension') && entity.isSuspended()) {
      return 'suspended';
    }
    return 'employed';
  }

  if (entity.hasFutureEmployment()) {
    return 'future_employed';
  }
  if (entity.isReleased()) {
    return 'released';
  }
  return 'unemployed';
}

// Availability checks treat an absent capability as passing.

export function isEmployedOrExempt(entity: RosterEntity): boolean {
  return !hasCapability(entity, 'employment') || entity.isEmployed();
}

export function isNotSuspendedOrExempt(entity: RosterEntity): boolean {
  return !hasCapability(entity, 'suspension') || !entity.isSuspended();
}

export function isNotInjuredOrExempt(entity: RosterEntity): boolean {
  return !hasCapability(entity, 'injury') || !entity.isInjured();
}

export function isNotRetiredOrExempt(entity: RosterEntity): boolean {
  return !hasCapability(entity, 'retirement') || !entity.isRetired();
}

/**
 * Available for booking: employed, not suspended, not injured, not retired.
 * Short-circuits on the first failing check.
 */
export function isAvailable(entity: RosterEntity): boolean {
  return (
    isEmployedOrExempt(entity) &&
    isNotSuspendedOrExempt(entity) &&
    isNotInjuredOrExempt(entity) &&
    isNotRetiredOrExempt(entity)
  );
}
