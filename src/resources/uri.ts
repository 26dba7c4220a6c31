import type { InstallFamily } from '../types.js';
import { isInstallFamily } from '../install-types/registry.js';

export type ResourceKind = 'family';

const RESOURCE_SCHEME = 'ocstypes:';
const RESOURCE_KINDS: ReadonlySet<string> = new Set(['family']);

export function buildResourceUri(kind: ResourceKind, family: InstallFamily): string {
  return `ocstypes://${kind}/${encodeURIComponent(family)}`;
}

export function buildResourceUriTemplate(kind: ResourceKind, paramName = 'family'): string {
  return `ocstypes://${kind}/{${paramName}}`;
}

export function parseResourceUri(uri: string): { kind: ResourceKind; family: InstallFamily } | null {
  try {
    const parsed = new URL(uri);
    if (parsed.protocol !== RESOURCE_SCHEME) return null;
    if (parsed.username || parsed.password || parsed.port) return null;
    if (parsed.search || parsed.hash) return null;

    const kind = parsed.hostname;
    if (!RESOURCE_KINDS.has(kind)) return null;

    const parts = parsed.pathname.split('/').filter(Boolean);
    if (parts.length !== 1) return null;

    const family = decodeURIComponent(parts[0] || '');
    if (!isInstallFamily(family)) return null;

    return { kind: 'family', family };
  } catch {
    return null;
  }
}
