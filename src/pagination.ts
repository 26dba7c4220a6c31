import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';

type CursorPayload = {
    offset: number;
};

export type PaginationResult<T> = {
    items: T[];
    nextCursor?: string;
};

/**
 * Slice a list endpoint's items into pages addressed by an opaque cursor
 */
export function paginateResults<T>(
    items: readonly T[],
    cursor: string | undefined,
    pageSize: number
): PaginationResult<T> {
    if (!Number.isInteger(pageSize) || pageSize <= 0) {
        throw new McpError(ErrorCode.InvalidParams, 'Page size must be a positive integer');
    }

    const offset = cursor === undefined ? 0 : decodeCursor(cursor);
    if (offset > items.length) {
        throw new McpError(ErrorCode.InvalidParams, 'Invalid cursor');
    }

    const end = Math.min(items.length, offset + pageSize);
    const page = items.slice(offset, end);
    return end < items.length
        ? { items: page, nextCursor: encodeCursor({ offset: end }) }
        : { items: page };
}

function decodeCursor(cursor: string): number {
    let payload: unknown;
    try {
        payload = JSON.parse(Buffer.from(cursor, 'base64').toString('utf8'));
    } catch {
        throw new McpError(ErrorCode.InvalidParams, 'Invalid cursor');
    }

    const offset = isCursorPayload(payload) ? payload.offset : -1;
    if (!Number.isInteger(offset) || offset < 0) {
        throw new McpError(ErrorCode.InvalidParams, 'Invalid cursor');
    }
    return offset;
}

function isCursorPayload(value: unknown): value is CursorPayload {
    return typeof value === 'object' && value !== null && 'offset' in value && typeof value.offset === 'number';
}

function encodeCursor(payload: CursorPayload): string {
    return Buffer.from(JSON.stringify(payload), 'utf8').toString('base64');
}
