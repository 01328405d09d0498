import type { PortalProfile } from './types';
import { OlxProfile } from './olx';
import { ZapProfile } from './zap';

export const PORTAL_KEYS = ['olx', 'zap'] as const;

export type PortalKey = (typeof PORTAL_KEYS)[number];

export const PORTALS: Record<PortalKey, PortalProfile> = {
  olx: OlxProfile,
  zap: ZapProfile,
};
