export type JsonExtraction = { ok: true; value: unknown } | { ok: false; reason: string };

type Attempt = { ok: true; value: unknown } | { ok: false; error: string };

// A fence counts only when it wraps the whole response.
const WHOLE_FENCE = /^```[\w-]*[ \t]*\r?\n([\s\S]*)\r?\n[ \t]*```$/;

function tryParse(text: string): Attempt {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (e) {
    return { ok: false, error: e instanceof Error ? e.message : String(e) };
  }
}

/**
 * End index (inclusive) of the object opening at `start`, skipping braces
 * inside string literals, or -1 when it never closes.
 */
function objectEnd(s: string, start: number): number {
  let depth = 0;
  let inString = false;

  for (let i = start; i < s.length; i++) {
    const ch = s[i];
    if (inString) {
      if (ch === '\\') i++;
      else if (ch === '"') inString = false;
    } else if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}' && --depth === 0) {
      return i;
    }
  }
  return -1;
}

/** Every balanced `{...}` candidate, left to right. */
export function objectSlices(text: string): string[] {
  const out: string[] = [];
  for (let start = text.indexOf('{'); start !== -1; start = text.indexOf('{', start + 1)) {
    const end = objectEnd(text, start);
    if (end !== -1) out.push(text.slice(start, end + 1));
  }
  return out;
}

/**
 * Pulls a JSON value out of model output. Tries, in order: the whole text,
 * the body of a fence around the whole text, then each embedded object until
 * one parses.
 */
export function extractFirstJsonObject(text: string): JsonExtraction {
  const trimmed = text.trim();

  const whole = tryParse(trimmed);
  if (whole.ok) return whole;

  const fenced = trimmed.match(WHOLE_FENCE)?.[1];
  if (fenced !== undefined) {
    const inner = tryParse(fenced.trim());
    if (inner.ok) return inner;
  }

  let firstError: string | undefined;
  for (const slice of objectSlices(fenced ?? trimmed)) {
    const attempt = tryParse(slice);
    if (attempt.ok) return attempt;
    if (firstError === undefined) firstError = attempt.error;
  }

  if (firstError === undefined) return { ok: false, reason: 'no JSON object found in response' };
  return { ok: false, reason: `invalid JSON: ${firstError}` };
}
