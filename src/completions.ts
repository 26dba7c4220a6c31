import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { isInstallFamily, listAllTokens, listInstallFamilies, listInstallTypes } from './install-types/registry.js';

const MAX_COMPLETION_VALUES = 100;
const RESOURCE_TEMPLATE_PATTERN = /^ocstypes:\/\/([^/]+)\/\{([^}]+)\}$/;
const RESOURCE_KINDS = new Set(['family']);

const LINK_PREFIXES = [
    'ocs://install?url=',
    'ocs://download?url=',
    'ocss://install?url=',
    'ocss://download?url=',
];

export type CompletionParams = {
    ref: { type: 'ref/prompt'; name: string } | { type: 'ref/resource'; uri: string };
    argument: { name: string; value: string };
    context?: { arguments?: Record<string, string> };
};

export type CompletionResult = {
    completion: {
        values: string[];
        total?: number;
        hasMore?: boolean;
    };
};

export type CompletionOptions = {
    prompts: Array<{ name: string }>;
};

export function buildCompletionResult(
    params: CompletionParams,
    options: CompletionOptions
): CompletionResult {
    if (!params.ref || !params.argument) {
        throw new McpError(ErrorCode.InvalidParams, 'Missing completion parameters');
    }

    const argumentName = requireString(params.argument.name, 'argument.name');
    const argumentValue = requireString(params.argument.value, 'argument.value');

    if (params.ref.type === 'ref/prompt') {
        const promptName = requireString(params.ref.name, 'ref.name');
        const promptNames = new Set(options.prompts.map(prompt => prompt.name));
        if (!promptNames.has(promptName)) {
            throw new McpError(ErrorCode.InvalidParams, `Prompt ${promptName} not found`);
        }

        const candidates = promptCandidates(promptName, argumentName, params.context?.arguments);
        return buildCompletion(candidates, argumentValue);
    }

    if (params.ref.type === 'ref/resource') {
        const uri = requireString(params.ref.uri, 'ref.uri');
        const match = uri.match(RESOURCE_TEMPLATE_PATTERN);
        if (!match || !RESOURCE_KINDS.has(match[1] ?? '') || match[2] !== argumentName) {
            return buildCompletion([], argumentValue);
        }
        return buildCompletion(listInstallFamilies(), argumentValue);
    }

    throw new McpError(ErrorCode.InvalidParams, 'Unsupported completion ref type');
}

function promptCandidates(
    promptName: string,
    argumentName: string,
    context: Record<string, string> | undefined
): string[] {
    if (promptName === 'inspect_link' && argumentName === 'link') {
        return LINK_PREFIXES;
    }
    if (promptName === 'resolve_install_path') {
        if (argumentName === 'family') {
            return listInstallFamilies();
        }
        if (argumentName === 'install_type') {
            // Narrow to one family once the client has picked it
            const family = context?.['family'];
            if (family && isInstallFamily(family)) {
                return listInstallTypes(family).variants.flatMap(entry => entry.tokens);
            }
            return listAllTokens();
        }
    }
    return [];
}

function buildCompletion(values: string[], input: string): CompletionResult {
    const matches = rankAndFilter(values, input);
    const limited = matches.slice(0, MAX_COMPLETION_VALUES);
    const hasMore = matches.length > limited.length;
    return {
        completion: {
            values: limited,
            total: matches.length || undefined,
            hasMore: hasMore || undefined,
        },
    };
}

/**
 * Keep values containing the input, earliest match first, then shortest
 */
function rankAndFilter(values: string[], input: string): string[] {
    const needle = input.trim().toLowerCase();
    const unique = [...new Set(values)];

    if (!needle) {
        return unique;
    }

    return unique
        .map(value => ({ value, index: value.toLowerCase().indexOf(needle) }))
        .filter(entry => entry.index !== -1)
        .sort((a, b) => {
            if (a.index !== b.index) return a.index - b.index;
            if (a.value.length !== b.value.length) return a.value.length - b.value.length;
            return a.value.localeCompare(b.value);
        })
        .map(entry => entry.value);
}

function requireString(value: unknown, label: string): string {
    if (typeof value !== 'string') {
        throw new McpError(ErrorCode.InvalidParams, `${label} must be a string`);
    }
    return value;
}
