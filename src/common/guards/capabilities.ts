import { UnauthorizedActionError } from '../exceptions/domain.exceptions';
import { Actor } from '../types/actor';
import { Capability, hasCapability } from '../types/permissions';

export function assertCapability(actor: Actor, capability: Capability): void {
  if (!hasCapability(actor.role, capability)) {
    throw UnauthorizedActionError.missingCapability(capability, actor.role);
  }
}
