import { z } from 'zod';

import { parseResponse, postJson } from './http.js';

export type OpenAIRequest = {
  apiKey: string;
  model: string;
  instructions?: string;
  prompt: string;
  timeoutMs?: number;
  temperature?: number;
  jsonMode?: boolean;
};

const ResponseSchema = z
  .object({
    output_text: z.string().optional(),
    output: z
      .array(
        z
          .object({
            content: z.array(z.object({ text: z.string().optional() }).passthrough()).optional(),
          })
          .passthrough()
      )
      .optional(),
  })
  .passthrough();

export async function callOpenAI({
  apiKey,
  model,
  instructions,
  prompt,
  timeoutMs,
  temperature,
  jsonMode,
}: OpenAIRequest): Promise<string> {
  const raw = await postJson({
    provider: 'OpenAI',
    url: 'https://api.openai.com/v1/responses',
    headers: { Authorization: `Bearer ${apiKey}` },
    body: {
      model,
      input: prompt,
      ...(instructions ? { instructions } : {}),
      ...(typeof temperature === 'number' ? { temperature } : {}),
      ...(jsonMode ? { text: { format: { type: 'json_object' } } } : {}),
    },
    timeoutMs,
  });

  const data = parseResponse('OpenAI', ResponseSchema, raw);
  if (typeof data.output_text === 'string' && data.output_text.trim()) return data.output_text;

  return (data.output ?? [])
    .map((o) => (o.content ?? []).map((c) => c.text ?? '').join(''))
    .filter((s) => s.trim())
    .join('\n');
}
