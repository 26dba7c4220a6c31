#!/usr/bin/env node

/**
 * ocs-link-mcp
 *
 * MCP server that parses, validates and renders ocs:// install links and
 * resolves install types to install-path templates.
 */

import 'dotenv/config';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  CompleteRequestSchema,
  ListPromptsRequestSchema,
  GetPromptRequestSchema,
  ListResourcesRequestSchema,
  ListResourceTemplatesRequestSchema,
  ReadResourceRequestSchema,
  McpError,
  ErrorCode,
} from '@modelcontextprotocol/sdk/types.js';

import { loadConfig, validateConfig, getConfig } from './config.js';
import { executeParse, getParseInputSchema } from './tools/parse.js';
import { executeRender, getRenderInputSchema } from './tools/render.js';
import { executeResolve, getResolveInputSchema } from './tools/resolve.js';
import { listResources, listResourceTemplates, readResource } from './resources/handlers.js';
import { isInstallFamily } from './install-types/registry.js';
import { buildCompletionResult } from './completions.js';
import { paginateResults } from './pagination.js';

const PROMPTS = [
  {
    name: 'inspect_link',
    title: 'Inspect OCS Link',
    description: 'Parse an ocs:// link and explain what it would install',
    arguments: [
      { name: 'link', description: 'The ocs:// or ocss:// link', required: true },
    ],
  },
  {
    name: 'resolve_install_path',
    title: 'Resolve Install Path',
    description: 'Find where an install type is placed on disk',
    arguments: [
      { name: 'install_type', description: 'Install type token, e.g. gnome_shell_extensions', required: true },
      { name: 'family', description: 'Restrict the lookup to one family', required: false },
    ],
  },
];

const PROMPT_MAP = new Map(PROMPTS.map(prompt => [prompt.name, prompt]));

function getArgs(
  args: Record<string, string> | undefined,
  required: string[]
): Record<string, string> {
  const resolved: Record<string, string> = {};
  for (const key of required) {
    const value = args?.[key];
    if (!value || value.trim() === '') {
      throw new McpError(ErrorCode.InvalidParams, `Missing required argument: ${key}`);
    }
    resolved[key] = value;
  }

  if (args) {
    for (const [key, value] of Object.entries(args)) {
      if (value !== undefined) {
        resolved[key] = value;
      }
    }
  }

  return resolved;
}

function requireRecord(value: unknown, label: string): Record<string, unknown> {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    throw new McpError(ErrorCode.InvalidParams, `${label} must be an object`);
  }
  return value as Record<string, unknown>;
}

function optionalRecord(value: unknown, label: string): Record<string, unknown> | undefined {
  if (value === undefined) {
    return undefined;
  }
  return requireRecord(value, label);
}

function requireString(value: unknown, label: string): string {
  if (typeof value !== 'string') {
    throw new McpError(ErrorCode.InvalidParams, `Missing required parameter: ${label}`);
  }
  return value;
}

function optionalString(value: unknown, label: string): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new McpError(ErrorCode.InvalidParams, `${label} must be a string`);
  }
  return value;
}

function optionalBoolean(value: unknown, label: string): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw new McpError(ErrorCode.InvalidParams, `${label} must be a boolean`);
  }
  return value;
}

function buildInspectLinkPrompt(args: Record<string, string>): string {
  const payload = {
    link: args['link'] ?? '',
    options: { check_install_type: true },
  };

  return [
    'Call the `parse_link` tool with the following input:',
    '```json',
    JSON.stringify(payload, null, 2),
    '```',
    '',
    'Then summarize the command, the download URL, the file name and the install path.',
  ].join('\n');
}

function buildResolveInstallPathPrompt(args: Record<string, string>): string {
  const payload: Record<string, unknown> = { install_type: args['install_type'] ?? '' };
  const family = args['family'];
  if (family) {
    payload['family'] = family;
  }

  return [
    'Call the `resolve_install_type` tool with the following input:',
    '```json',
    JSON.stringify(payload, null, 2),
    '```',
    '',
    'Placeholders such as $HOME and $XDG_DATA_HOME in the path template are left for the installer to expand.',
  ].join('\n');
}

// Tool definitions
const TOOLS = [
  {
    name: 'parse_link',
    description: `Parse and validate an ocs:// or ocss:// link.

Returns the link's scheme, command (install or download), download URL, install type and optional file name, plus its canonical form.
When the install type is known, the resolved family, variant and install-path template are included.

Set options.check_install_type to fail on unknown install types.`,
    inputSchema: getParseInputSchema(),
  },
  {
    name: 'render_link',
    description: `Build the canonical ocs:// link from its fields.

The download URL is percent-encoded; the type and file name are written as given.
Fields that would not parse back unchanged (e.g. a file name containing #, & or +) are rejected.`,
    inputSchema: getRenderInputSchema(),
  },
  {
    name: 'resolve_install_type',
    description: `Resolve an install type token (e.g. plasma_look_and_feel, xfwm4_themes, music) to its family, variant and install-path template.

Families are probed in the configured priority order unless one is given.`,
    inputSchema: getResolveInputSchema(),
  },
];

const SERVER_INSTRUCTIONS = [
  'Use parse_link to validate ocs:// links before downloading anything they point to.',
  '',
  'Install-type tables are available as resources:',
  '  ocstypes://family/{family}',
  '',
  'Families: personal_media, styling, wm_themes, desktop_assets, app_specific',
].join('\n');

function callTool(name: string, args: Record<string, unknown> | undefined): { success: boolean } {
  switch (name) {
    case 'parse_link': {
      const argsObject = requireRecord(args, 'arguments');
      const link = requireString(argsObject['link'], 'link');
      const options = optionalRecord(argsObject['options'], 'options');
      const checkInstallType = optionalBoolean(options?.['check_install_type'], 'options.check_install_type');
      return executeParse({
        link,
        options: checkInstallType === undefined ? undefined : { check_install_type: checkInstallType },
      });
    }

    case 'render_link': {
      const argsObject = requireRecord(args, 'arguments');
      const link = requireRecord(argsObject['link'], 'link');
      return executeRender({
        link: {
          scheme: requireString(link['scheme'], 'link.scheme'),
          command: requireString(link['command'], 'link.command'),
          downloadUrl: requireString(link['download_url'], 'link.download_url'),
          installType: requireString(link['install_type'], 'link.install_type'),
          filename: optionalString(link['filename'], 'link.filename'),
        },
      });
    }

    case 'resolve_install_type': {
      const argsObject = requireRecord(args, 'arguments');
      const installType = requireString(argsObject['install_type'], 'install_type');
      const family = optionalString(argsObject['family'], 'family');
      if (family !== undefined && !isInstallFamily(family)) {
        throw new McpError(ErrorCode.InvalidParams, `Unknown install type family: ${family}`);
      }
      return executeResolve({ install_type: installType, family });
    }

    default:
      throw new McpError(ErrorCode.InvalidParams, `Unknown tool: ${name}`);
  }
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  // Load and validate configuration
  const config = loadConfig();
  const configErrors = validateConfig(config);

  if (configErrors.length > 0) {
    console.error('Configuration errors:');
    configErrors.forEach(err => console.error(`  - ${err}`));
    process.exit(1);
  }

  // Create MCP server
  const server = new Server(
    {
      name: 'ocs-link-mcp',
      version: '1.0.0',
    },
    {
      capabilities: {
        tools: {
          listChanged: false,
        },
        completions: {},
        prompts: {
          listChanged: false,
        },
        resources: {
          listChanged: false,
        },
      },
      instructions: SERVER_INSTRUCTIONS,
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async (request) => {
    const { items, nextCursor } = paginateResults(TOOLS, request.params?.cursor, getConfig().pageSize);
    return {
      tools: items,
      ...(nextCursor ? { nextCursor } : {}),
    };
  });

  server.setRequestHandler(ListPromptsRequestSchema, async (request) => {
    const { items, nextCursor } = paginateResults(PROMPTS, request.params?.cursor, getConfig().pageSize);
    return {
      prompts: items,
      ...(nextCursor ? { nextCursor } : {}),
    };
  });

  server.setRequestHandler(CompleteRequestSchema, async (request) => {
    return buildCompletionResult(request.params, { prompts: PROMPTS });
  });

  server.setRequestHandler(GetPromptRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const prompt = PROMPT_MAP.get(name);
    if (!prompt) {
      throw new McpError(ErrorCode.InvalidParams, `Prompt ${name} not found`);
    }

    switch (name) {
      case 'inspect_link': {
        const resolved = getArgs(args, ['link']);
        return {
          description: prompt.description,
          messages: [
            {
              role: 'user',
              content: {
                type: 'text',
                text: buildInspectLinkPrompt(resolved),
              },
            },
          ],
        };
      }
      case 'resolve_install_path': {
        const resolved = getArgs(args, ['install_type']);
        return {
          description: prompt.description,
          messages: [
            {
              role: 'user',
              content: {
                type: 'text',
                text: buildResolveInstallPathPrompt(resolved),
              },
            },
          ],
        };
      }
      default:
        throw new McpError(ErrorCode.InvalidParams, `Prompt ${name} not found`);
    }
  });

  server.setRequestHandler(ListResourcesRequestSchema, async (request) => {
    const { resources } = listResources();
    const { items, nextCursor } = paginateResults(resources, request.params?.cursor, getConfig().pageSize);
    return {
      resources: items,
      ...(nextCursor ? { nextCursor } : {}),
    };
  });

  server.setRequestHandler(ListResourceTemplatesRequestSchema, async (request) => {
    const { resourceTemplates } = listResourceTemplates();
    const { items, nextCursor } = paginateResults(resourceTemplates, request.params?.cursor, getConfig().pageSize);
    return {
      resourceTemplates: items,
      ...(nextCursor ? { nextCursor } : {}),
    };
  });

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    return readResource(request.params.uri);
  });

  // Handle tool calls
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      const result = callTool(name, args);
      if (getConfig().logToolCalls) {
        console.error(`tool ${name}: ${result.success ? 'ok' : 'failed'}`);
      }

      return {
        content: [
          {
            type: 'text',
            text: JSON.stringify(result, null, 2),
          },
        ],
        isError: !result.success,
      };
    } catch (err) {
      if (getConfig().logToolCalls) {
        console.error(`tool ${name}: error`, err);
      }
      if (err instanceof McpError) {
        throw err;
      }
      return {
        content: [
          {
            type: 'text',
            text: JSON.stringify({
              success: false,
              error: {
                code: 'TOOL_ERROR',
                message: err instanceof Error ? err.message : 'Unknown error',
              },
            }),
          },
        ],
        isError: true,
      };
    }
  });

  // Handle graceful shutdown
  const shutdown = async () => {
    console.error('Shutting down...');
    await server.close();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  // Start server
  const transport = new StdioServerTransport();
  await server.connect(transport);

  console.error('ocs-link-mcp server started');
}

// Run
main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
