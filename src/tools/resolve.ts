/**
 * Resolve Tool
 *
 * Maps an install-type token to its family, variant and install-path template.
 */

import type { InstallFamily } from '../types.js';
import {
  installPathTemplate,
  listInstallFamilies,
  resolveAnyInstallType,
  resolveCategory,
} from '../install-types/registry.js';
import { describeRegistryError } from '../ocs/errors.js';
import { getConfig, getInstallTypePriority } from '../config.js';

export interface ResolveToolInput {
  install_type: string;
  family?: InstallFamily;
}

export interface ResolveToolOutput {
  success: boolean;
  family?: InstallFamily;
  variant?: string;
  path_template?: string;
  error?: {
    code: string;
    message: string;
  };
}

/**
 * Execute the resolve tool
 */
export function executeResolve(input: ResolveToolInput): ResolveToolOutput {
  const resolved = input.family
    ? resolveCategory(input.family, input.install_type)
    : resolveAnyInstallType(input.install_type, getInstallTypePriority(getConfig()));

  if (!resolved.success) {
    return {
      success: false,
      error: {
        code: resolved.error.code,
        message: describeRegistryError(resolved.error),
      },
    };
  }

  return {
    success: true,
    family: resolved.value.family,
    variant: resolved.value.variant,
    path_template: installPathTemplate(resolved.value),
  };
}

/**
 * Get JSON schema for resolve tool input
 */
export function getResolveInputSchema(): object {
  return {
    type: 'object',
    properties: {
      install_type: {
        type: 'string',
        description: 'Install type token from a link\'s type parameter',
      },
      family: {
        type: 'string',
        enum: listInstallFamilies(),
        description: 'Only look in this family (personal_media matches case-insensitively)',
      },
    },
    required: ['install_type'],
  };
}
