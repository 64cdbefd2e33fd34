import { z } from 'zod';

import { parseResponse, postJson } from './http.js';

export type GeminiRequest = {
  apiKey: string;
  model: string;
  messages: Array<{ role: 'system' | 'user' | 'assistant'; content: string }>;
  timeoutMs?: number;
  temperature?: number;
  // ask the model for application/json output
  jsonMode?: boolean;
};

const GenerateContentSchema = z
  .object({
    candidates: z.array(
      z
        .object({
          content: z
            .object({ parts: z.array(z.object({ text: z.string().optional() }).passthrough()).optional() })
            .passthrough()
            .optional(),
        })
        .passthrough()
    ),
  })
  .passthrough();

export async function callGemini({ apiKey, model, messages, timeoutMs, temperature, jsonMode }: GeminiRequest): Promise<string> {
  // Gemini takes system text separately and calls the assistant "model".
  const system = messages
    .filter((m) => m.role === 'system')
    .map((m) => m.content)
    .join('\n\n');

  const contents = messages
    .filter((m) => m.role !== 'system')
    .map((m) => ({
      role: m.role === 'assistant' ? 'model' : 'user',
      parts: [{ text: m.content }],
    }));

  const generationConfig = {
    ...(typeof temperature === 'number' ? { temperature } : {}),
    ...(jsonMode ? { responseMimeType: 'application/json' } : {}),
  };

  const raw = await postJson({
    provider: 'Gemini',
    url: `https://generativelanguage.googleapis.com/v1beta/models/${encodeURIComponent(model)}:generateContent`,
    headers: { 'x-goog-api-key': apiKey },
    body: {
      contents,
      ...(system ? { systemInstruction: { parts: [{ text: system }] } } : {}),
      ...(Object.keys(generationConfig).length ? { generationConfig } : {}),
    },
    timeoutMs,
  });

  const data = parseResponse('Gemini', GenerateContentSchema, raw);
  return (data.candidates[0]?.content?.parts ?? []).map((p) => p.text ?? '').join('');
}
