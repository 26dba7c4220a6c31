/**
 * Render Tool
 *
 * Builds the canonical ocs:// link from separate fields.
 */

import type { LinkFields } from '../types.js';
import { createOcsLink } from '../ocs/parser.js';
import { describeLinkError } from '../ocs/errors.js';

export interface RenderToolInput {
  link: LinkFields;
}

export interface RenderToolOutput {
  success: boolean;
  canonical?: string;
  error?: {
    code: string;
    message: string;
  };
}

/**
 * Execute the render tool
 */
export function executeRender(input: RenderToolInput): RenderToolOutput {
  const created = createOcsLink(input.link);

  if (!created.success) {
    return {
      success: false,
      error: {
        code: created.error.code,
        message: describeLinkError(created.error),
      },
    };
  }

  return {
    success: true,
    canonical: created.link.rawUri,
  };
}

/**
 * Get JSON schema for render tool input
 */
export function getRenderInputSchema(): object {
  return {
    type: 'object',
    properties: {
      link: {
        type: 'object',
        description: 'Link fields to render',
        properties: {
          scheme: { type: 'string', enum: ['ocs', 'ocss'] },
          command: { type: 'string', enum: ['install', 'download'] },
          download_url: { type: 'string', description: 'Absolute URL of the file' },
          install_type: { type: 'string', description: 'Install type token, e.g. plasma_look_and_feel' },
          filename: { type: 'string', description: 'Optional file name to save as' },
        },
        required: ['scheme', 'command', 'download_url', 'install_type'],
      },
    },
    required: ['link'],
  };
}
