const FENCE = '```';
const JSON_FENCE = '```json';

/**
 * Pull the JSON candidate out of a free-text model reply.
 *
 * Takes the body of the first ```json fence if there is one, else the body of
 * the first plain ``` fence, else the whole reply. An unterminated fence
 * yields everything after the opening marker.
 */
export function extractJsonCandidate(reply: string): string {
    const jsonFenceAt = reply.indexOf(JSON_FENCE);
    if (jsonFenceAt !== -1) {
        return fencedBody(reply, jsonFenceAt + JSON_FENCE.length);
    }

    const fenceAt = reply.indexOf(FENCE);
    if (fenceAt !== -1) {
        return fencedBody(reply, fenceAt + FENCE.length);
    }

    return reply.trim();
}

function fencedBody(reply: string, start: number): string {
    const end = reply.indexOf(FENCE, start);
    const body = end === -1 ? reply.slice(start) : reply.slice(start, end);
    return body.trim();
}

export type JsonParseResult =
    | { ok: true; value: unknown }
    | { ok: false; error: string };

export function safeJsonParse(text: string): JsonParseResult {
    try {
        return { ok: true, value: JSON.parse(text) };
    } catch (error) {
        return { ok: false, error: error instanceof Error ? error.message : String(error) };
    }
}
