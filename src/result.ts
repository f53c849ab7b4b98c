// Tool results: a tagged outcome internally, a single string at the transport boundary.

export type FailureKind = 'not_found' | 'invalid_argument' | 'limit_exceeded' | 'no_effects';

export type ToolOutcome =
  | { ok: true; text: string; path?: string; notes?: string }
  | { ok: false; kind: FailureKind; message: string };

/**
 * An expected, user-facing failure. Operations throw it from any depth;
 * `runTool` turns it into a failure outcome instead of a protocol error.
 */
export class ToolError extends Error {
  constructor(
    readonly kind: FailureKind,
    message: string
  ) {
    super(message);
    this.name = 'ToolError';
  }
}

export function success(text: string, extra: { path?: string; notes?: string } = {}): ToolOutcome {
  return { ok: true, text, ...extra };
}

export function failure(kind: FailureKind, message: string): ToolOutcome {
  return { ok: false, kind, message };
}

export async function runTool(fn: () => Promise<ToolOutcome>): Promise<ToolOutcome> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof ToolError) {
      return failure(err.kind, err.message);
    }
    throw err;
  }
}

export function renderOutcome(outcome: ToolOutcome): string {
  if (!outcome.ok) {
    return `Error: ${outcome.message}`;
  }
  return outcome.notes ? `${outcome.text}\n\nModel notes: ${outcome.notes}` : outcome.text;
}
