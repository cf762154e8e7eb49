/**
 * Outcome of a single delegate call: the complete response, or a one-line
 * description of why there is none.
 */
export type QueryResult = { ok: true; response: string } | { ok: false; fault: string };

export function ok(response: string): QueryResult {
  return { ok: true, response };
}

export function fault(description: string): QueryResult {
  return { ok: false, fault: description };
}

export function describeFault(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
