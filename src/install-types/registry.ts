/**
 * Install-type resolution
 *
 * Token -> variant lookups within one family, variant -> path template lookups,
 * and a priority-ordered probe across families for tokens whose family is not
 * known up front.
 */

import type { InstallFamily, RegistryResult } from '../types.js';
import {
  AppSpecific,
  DEFAULT_FAMILY_ORDER,
  DesktopAssets,
  FAMILIES,
  PersonalMedia,
  Styling,
  WmThemes,
  type InstallCategory,
  type InstallTypeFamily,
} from './families.js';

export interface InstallTypeEntry {
  variant: string;
  pathTemplate: string;
  tokens: string[];
}

export interface FamilyListing {
  family: InstallFamily;
  caseSensitive: boolean;
  variants: InstallTypeEntry[];
}

function lookupVariant<V extends string>(family: InstallTypeFamily<V>, token: string): V | undefined {
  return family.tokens.get(family.caseSensitive ? token : token.toLowerCase());
}

/**
 * Resolve a token within a single family
 */
export function resolveInstallType<V extends string>(
  family: InstallTypeFamily<V>,
  token: string
): RegistryResult<V> {
  const variant = lookupVariant(family, token);
  if (variant === undefined) {
    return {
      success: false,
      error: { code: 'NO_MATCHING_INSTALL_TYPE', token, family: family.id },
    };
  }
  return { success: true, value: variant };
}

export function pathTemplate<V extends string>(family: InstallTypeFamily<V>, variant: V): string {
  return family.paths[variant];
}

export function installPathTemplate(category: InstallCategory): string {
  switch (category.family) {
    case 'personal_media':
      return pathTemplate(PersonalMedia, category.variant);
    case 'styling':
      return pathTemplate(Styling, category.variant);
    case 'wm_themes':
      return pathTemplate(WmThemes, category.variant);
    case 'desktop_assets':
      return pathTemplate(DesktopAssets, category.variant);
    case 'app_specific':
      return pathTemplate(AppSpecific, category.variant);
  }
}

/**
 * Resolve a token within the named family, as a category
 */
export function resolveCategory(family: InstallFamily, token: string): RegistryResult<InstallCategory> {
  const category = findCategory(family, token);
  if (!category) {
    return {
      success: false,
      error: { code: 'NO_MATCHING_INSTALL_TYPE', token, family },
    };
  }
  return { success: true, value: category };
}

function findCategory(family: InstallFamily, token: string): InstallCategory | undefined {
  switch (family) {
    case 'personal_media': {
      const variant = lookupVariant(PersonalMedia, token);
      return variant && { family, variant };
    }
    case 'styling': {
      const variant = lookupVariant(Styling, token);
      return variant && { family, variant };
    }
    case 'wm_themes': {
      const variant = lookupVariant(WmThemes, token);
      return variant && { family, variant };
    }
    case 'desktop_assets': {
      const variant = lookupVariant(DesktopAssets, token);
      return variant && { family, variant };
    }
    case 'app_specific': {
      const variant = lookupVariant(AppSpecific, token);
      return variant && { family, variant };
    }
  }
}

/**
 * Probe families in order and return the first match
 */
export function resolveAnyInstallType(
  token: string,
  order: readonly InstallFamily[] = DEFAULT_FAMILY_ORDER
): RegistryResult<InstallCategory> {
  for (const family of order) {
    const category = findCategory(family, token);
    if (category) {
      return { success: true, value: category };
    }
  }
  return { success: false, error: { code: 'NO_MATCHING_INSTALL_TYPE', token } };
}

export function isInstallFamily(value: string): value is InstallFamily {
  return Object.prototype.hasOwnProperty.call(FAMILIES, value);
}

export function listInstallFamilies(): InstallFamily[] {
  return [...DEFAULT_FAMILY_ORDER];
}

/**
 * Every variant of a family with its path template and accepted tokens
 */
export function listInstallTypes(family: InstallFamily): FamilyListing {
  const definition = FAMILIES[family];
  const tokensByVariant = new Map<string, string[]>();
  for (const [token, variant] of definition.tokens) {
    const tokens = tokensByVariant.get(variant) ?? [];
    tokens.push(token);
    tokensByVariant.set(variant, tokens);
  }

  return {
    family,
    caseSensitive: definition.caseSensitive,
    variants: Object.entries(definition.paths).map(([variant, template]) => ({
      variant,
      pathTemplate: template,
      tokens: tokensByVariant.get(variant) ?? [],
    })),
  };
}

/**
 * All tokens across every family, in probe order
 */
export function listAllTokens(): string[] {
  return DEFAULT_FAMILY_ORDER.flatMap(family => [...FAMILIES[family].tokens.keys()]);
}
