/**
 * Optional registry check for a parsed link's install type.
 *
 * The parser accepts any `type` value; callers that need the link to name a
 * known install type run this afterwards.
 */

import type { InstallFamily, LinkError, ParsedLink } from '../types.js';
import type { InstallCategory } from '../install-types/families.js';
import { installPathTemplate, resolveAnyInstallType } from '../install-types/registry.js';

export type InstallTypeCheckResult =
  | { success: true; category: InstallCategory; pathTemplate: string }
  | { success: false; error: Extract<LinkError, { code: 'UNKNOWN_INSTALL_TYPE' }> };

export function checkInstallType(
  link: ParsedLink,
  order?: readonly InstallFamily[]
): InstallTypeCheckResult {
  const resolved = resolveAnyInstallType(link.installType, order);
  if (!resolved.success) {
    return {
      success: false,
      error: { code: 'UNKNOWN_INSTALL_TYPE', text: link.installType },
    };
  }
  return {
    success: true,
    category: resolved.value,
    pathTemplate: installPathTemplate(resolved.value),
  };
}
