export type JsonBodyResult = { ok: true; body: unknown } | { ok: false };

/**
 * Parse a JSON request body; a malformed body comes back as `{ ok: false }`.
 */
export async function readJsonBody(req: { json(): Promise<unknown> }): Promise<JsonBodyResult> {
  try {
    const body: unknown = await req.json();
    return { ok: true, body };
  } catch (error) {
    console.warn('[request] Invalid JSON body:', error instanceof Error ? error.message : error);
    return { ok: false };
  }
}

export const INVALID_JSON_ERROR = 'Request body must be valid JSON';
