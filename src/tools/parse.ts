/**
 * Parse Tool
 *
 * Parses an ocs:// link, returns its fields and canonical form, and reports
 * the install path when the install type is known.
 */

import type { ParsedLink } from '../types.js';
import { parseOcsLink } from '../ocs/parser.js';
import { renderOcsLink } from '../ocs/serializer.js';
import { describeLinkError } from '../ocs/errors.js';
import { checkInstallType } from '../ocs/install-type-check.js';
import { getConfig, getInstallTypePriority } from '../config.js';

export interface ParseOptions {
  check_install_type?: boolean;
}

export interface ParseToolInput {
  link: string;
  options?: ParseOptions;
}

export interface LinkOutput {
  raw_uri: string;
  scheme: string;
  command: string;
  download_url: string;
  install_type: string;
  filename?: string;
}

export interface InstallOutput {
  family: string;
  variant: string;
  path_template: string;
}

export interface ParseToolOutput {
  success: boolean;
  link?: LinkOutput;
  canonical?: string;
  install?: InstallOutput;
  error?: {
    code: string;
    message: string;
  };
}

export function toLinkOutput(link: ParsedLink): LinkOutput {
  return {
    raw_uri: link.rawUri,
    scheme: link.scheme,
    command: link.command,
    download_url: link.downloadUrl,
    install_type: link.installType,
    ...(link.filename !== undefined ? { filename: link.filename } : {}),
  };
}

/**
 * Execute the parse tool
 */
export function executeParse(input: ParseToolInput): ParseToolOutput {
  const config = getConfig();
  const parsed = parseOcsLink(input.link);

  if (!parsed.success) {
    return {
      success: false,
      error: {
        code: parsed.error.code,
        message: describeLinkError(parsed.error),
      },
    };
  }

  const link = toLinkOutput(parsed.link);
  const canonical = renderOcsLink(parsed.link);
  const checked = checkInstallType(parsed.link, getInstallTypePriority(config));

  if (!checked.success) {
    const required = input.options?.check_install_type ?? config.checkInstallTypes;
    if (required) {
      return {
        success: false,
        link,
        canonical,
        error: {
          code: checked.error.code,
          message: describeLinkError(checked.error),
        },
      };
    }
    return { success: true, link, canonical };
  }

  return {
    success: true,
    link,
    canonical,
    install: {
      family: checked.category.family,
      variant: checked.category.variant,
      path_template: checked.pathTemplate,
    },
  };
}

/**
 * Get JSON schema for parse tool input
 */
export function getParseInputSchema(): object {
  return {
    type: 'object',
    properties: {
      link: {
        type: 'string',
        description: 'The ocs:// or ocss:// link to parse',
      },
      options: {
        type: 'object',
        properties: {
          check_install_type: {
            type: 'boolean',
            description: 'Fail when the link\'s type is not a known install type',
          },
        },
      },
    },
    required: ['link'],
  };
}
