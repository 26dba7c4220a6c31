import type { Resource, ResourceTemplate, TextResourceContents } from '@modelcontextprotocol/sdk/types.js';
import { McpError } from '@modelcontextprotocol/sdk/types.js';
import type { InstallFamily } from '../types.js';
import { listInstallFamilies, listInstallTypes } from '../install-types/registry.js';
import { buildResourceUri, buildResourceUriTemplate, parseResourceUri } from './uri.js';

const RESOURCE_NOT_FOUND = -32002;
const MIME_TYPE = 'application/json';

const FAMILY_TITLES: Record<InstallFamily, string> = {
  personal_media: 'Personal Media',
  styling: 'Styling',
  wm_themes: 'Window Manager Themes',
  desktop_assets: 'Desktop Environment Assets',
  app_specific: 'Application Specific',
};

export function listResources(): { resources: Resource[] } {
  return { resources: listInstallFamilies().map(family => buildResource(family)) };
}

export function listResourceTemplates(): { resourceTemplates: ResourceTemplate[] } {
  return {
    resourceTemplates: [
      {
        uriTemplate: buildResourceUriTemplate('family'),
        name: 'install-type-family',
        title: 'Install Type Family',
        description: 'Variants, accepted tokens and install-path templates of one install-type family.',
        mimeType: MIME_TYPE,
      },
    ],
  };
}

export function readResource(uri: string): { contents: TextResourceContents[] } {
  const parsed = parseResourceUri(uri);
  if (!parsed) {
    throw resourceNotFound(uri);
  }

  const listing = listInstallTypes(parsed.family);
  return {
    contents: [
      {
        uri,
        mimeType: MIME_TYPE,
        text: JSON.stringify(
          {
            family: listing.family,
            case_sensitive: listing.caseSensitive,
            variants: listing.variants.map(entry => ({
              variant: entry.variant,
              path_template: entry.pathTemplate,
              tokens: entry.tokens,
            })),
          },
          null,
          2
        ),
      },
    ],
  };
}

function buildResource(family: InstallFamily): Resource {
  const listing = listInstallTypes(family);
  const matching = listing.caseSensitive ? 'case-sensitive' : 'case-insensitive';

  return {
    uri: buildResourceUri('family', family),
    name: family,
    title: FAMILY_TITLES[family],
    description: `${listing.variants.length} install types, ${matching} tokens`,
    mimeType: MIME_TYPE,
  };
}

function resourceNotFound(uri: string): McpError {
  return new McpError(RESOURCE_NOT_FOUND, 'Resource not found', { uri });
}
