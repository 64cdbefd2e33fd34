import { z } from 'zod';

import { parseResponse, postJson } from './http.js';

export type GithubModelsChatRequest = {
  token: string;
  model: string;
  messages: Array<{ role: 'system' | 'user' | 'assistant' | 'developer'; content: string }>;
  timeoutMs?: number;
  temperature?: number;
  jsonMode?: boolean;
};

const ChatCompletionSchema = z
  .object({
    choices: z.array(
      z.object({ message: z.object({ content: z.string().nullable().optional() }).passthrough() }).passthrough()
    ),
  })
  .passthrough();

export async function callGithubModels({
  token,
  model,
  messages,
  timeoutMs,
  temperature,
  jsonMode,
}: GithubModelsChatRequest): Promise<string> {
  const raw = await postJson({
    provider: 'GitHub Models',
    url: 'https://models.inference.ai.azure.com/chat/completions',
    headers: { Authorization: `Bearer ${token}` },
    body: {
      model,
      messages,
      ...(typeof temperature === 'number' ? { temperature } : {}),
      ...(jsonMode ? { response_format: { type: 'json_object' } } : {}),
    },
    timeoutMs,
  });

  const data = parseResponse('GitHub Models', ChatCompletionSchema, raw);
  return data.choices[0]?.message.content ?? '';
}
