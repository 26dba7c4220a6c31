/**
 * Completion unit tests
 */

import { describe, it, expect } from 'vitest';
import { McpError } from '@modelcontextprotocol/sdk/types.js';
import { buildCompletionResult } from '../../src/completions.js';

const PROMPTS = [
    { name: 'inspect_link' },
    { name: 'resolve_install_path' },
];

function complete(name: string, argument: string, value: string, context?: Record<string, string>): string[] {
    return buildCompletionResult(
        {
            ref: { type: 'ref/prompt', name },
            argument: { name: argument, value },
            ...(context ? { context: { arguments: context } } : {}),
        },
        { prompts: PROMPTS }
    ).completion.values;
}

describe('completion results', () => {
    it('suggests link prefixes', () => {
        expect(complete('inspect_link', 'link', 'ocss')).toEqual([
            'ocss://install?url=',
            'ocss://download?url=',
        ]);
    });

    it('suggests families', () => {
        expect(complete('resolve_install_path', 'family', 'wm')).toEqual(['wm_themes']);
    });

    it('ranks install types by match position, then length', () => {
        expect(complete('resolve_install_path', 'install_type', 'plasma5')).toEqual([
            'plasma5_plasmoids',
            'plasma5_desktopthemes',
            'plasma5_look_and_feel',
        ]);
    });

    it('narrows install types to the chosen family', () => {
        expect(complete('resolve_install_path', 'install_type', '', { family: 'personal_media' })).toEqual([
            'bin',
            'books',
            'comics',
            'documents',
            'downloads',
            'music',
            'pictures',
            'videos',
            'wallpapers',
        ]);
        expect(complete('resolve_install_path', 'install_type', 'themes', { family: 'styling' })).toEqual([
            'themes',
            'gtk_themes',
            'gtk2_themes',
            'gtk3_themes',
            'xfwm4_themes',
            'openbox_themes',
            'cinnamon_themes',
            'metacity_themes',
            'gnome_shell_themes',
        ]);
    });

    it('reports the number of matches', () => {
        const result = buildCompletionResult(
            {
                ref: { type: 'ref/prompt', name: 'resolve_install_path' },
                argument: { name: 'family', value: '' },
            },
            { prompts: PROMPTS }
        );
        expect(result.completion.total).toBe(5);
        expect(result.completion.hasMore).toBeUndefined();
    });

    it('returns invalid params for unknown prompts', () => {
        expect(() => complete('missing_prompt', 'link', '')).toThrowError(McpError);
    });

    it('suggests families for the resource template', () => {
        const result = buildCompletionResult(
            {
                ref: { type: 'ref/resource', uri: 'ocstypes://family/{family}' },
                argument: { name: 'family', value: 'st' },
            },
            { prompts: PROMPTS }
        );

        expect(result.completion.values).toEqual(['styling']);
    });

    it('returns nothing for unknown templates', () => {
        const result = buildCompletionResult(
            {
                ref: { type: 'ref/resource', uri: 'ocstypes://packet/{source_id}' },
                argument: { name: 'source_id', value: '' },
            },
            { prompts: PROMPTS }
        );

        expect(result.completion.values).toEqual([]);
    });
});
