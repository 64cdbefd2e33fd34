import type { z } from 'zod';

import { isAbortError, LLMRequestError, LLMTimeoutError } from './errors.js';

export type PostJsonRequest = {
  provider: string;
  url: string;
  headers: Record<string, string>;
  body: unknown;
  timeoutMs?: number;
};

// One request, optionally bounded by timeoutMs. No retries.
export async function postJson({ provider, url, headers, body, timeoutMs }: PostJsonRequest): Promise<unknown> {
  const ac = new AbortController();
  const t = typeof timeoutMs === 'number' ? setTimeout(() => ac.abort(), timeoutMs) : undefined;

  try {
    const resp = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...headers,
      },
      body: JSON.stringify(body),
      signal: ac.signal,
    });

    if (!resp.ok) {
      const text = await resp.text().catch(() => '');
      throw new LLMRequestError(
        `${provider} API error: ${resp.status} ${resp.statusText}${text ? `\n${text}` : ''}`,
        resp.status
      );
    }

    const data: unknown = await resp.json();
    return data;
  } catch (e) {
    if (isAbortError(e) && typeof timeoutMs === 'number') throw new LLMTimeoutError(provider, timeoutMs);
    throw e;
  } finally {
    if (t) clearTimeout(t);
  }
}

export function parseResponse<S extends z.ZodTypeAny>(provider: string, schema: S, data: unknown): z.output<S> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const where = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new LLMRequestError(`${provider} returned an unexpected response shape (${where})`);
  }
  return parsed.data;
}
