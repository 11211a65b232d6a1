import { SetMetadata } from '@nestjs/common';
import { Capability } from '../types/permissions';

export const CAPABILITIES_KEY = 'capabilities';

/** The caller needs at least one of the listed capabilities. */
export const RequireCapabilities = (...capabilities: Capability[]) =>
  SetMetadata(CAPABILITIES_KEY, capabilities);
