import type { AccessMode } from '../shared/types.js';

export type TokenAudience = 'graph' | 'exchange';

export interface AccessModeCapabilities {
  label: string;
  supportsDomainDiscovery: boolean;
  tokenAudience: TokenAudience;
}

const ACCESS_MODES: Record<AccessMode, AccessModeCapabilities> = {
  graph: {
    label: 'Microsoft Graph API',
    supportsDomainDiscovery: true,
    tokenAudience: 'graph',
  },
  powershell: {
    label: 'Exchange Online admin shell',
    supportsDomainDiscovery: false,
    tokenAudience: 'exchange',
  },
};

export const isAccessMode = (value: unknown): value is AccessMode =>
  value === 'graph' || value === 'powershell';

export const getAccessModeCapabilities = (mode: AccessMode): AccessModeCapabilities => ACCESS_MODES[mode];
