import { callOpenAI } from './openai.js';
import { callGithubModels } from './github-models.js';
import { callGemini } from './google-gemini.js';

export const LLM_PROVIDERS = ['openai', 'github-models', 'google'] as const;

export type LLMProvider = (typeof LLM_PROVIDERS)[number];

export type LLMMessage = {
  role: 'system' | 'user' | 'assistant' | 'developer';
  content: string;
};

export type LLMRequest = {
  provider: LLMProvider;
  model: string;
  messages: LLMMessage[];

  // auth
  openaiApiKey?: string;
  githubToken?: string;
  googleApiKey?: string;

  timeoutMs?: number;
  temperature?: number;
  jsonMode?: boolean;
};

/** Text in, text out. The analyzer stage only ever sees this shape. */
export type LLMCapability = (messages: LLMMessage[]) => Promise<string>;

export function isLLMProvider(s: string): s is LLMProvider {
  return LLM_PROVIDERS.some((p) => p === s);
}

export async function callLLM(req: LLMRequest): Promise<string> {
  const { messages, timeoutMs, temperature, jsonMode } = req;

  switch (req.provider) {
    case 'openai': {
      if (!req.openaiApiKey) throw new Error('openaiApiKey is required for provider=openai');

      const isInstruction = (m: LLMMessage) => m.role === 'system' || m.role === 'developer';
      const instructions = messages
        .filter(isInstruction)
        .map((m) => m.content)
        .join('\n\n');
      const prompt = messages
        .filter((m) => !isInstruction(m))
        .map((m) => (m.role === 'user' ? m.content : `${m.role.toUpperCase()}:\n${m.content}`))
        .join('\n\n');

      return callOpenAI({
        apiKey: req.openaiApiKey,
        model: req.model,
        instructions: instructions || undefined,
        prompt,
        timeoutMs,
        temperature,
        jsonMode,
      });
    }

    case 'github-models': {
      if (!req.githubToken) throw new Error('githubToken is required for provider=github-models');

      return callGithubModels({
        token: req.githubToken,
        model: req.model,
        messages,
        timeoutMs,
        temperature,
        jsonMode,
      });
    }

    case 'google': {
      if (!req.googleApiKey) throw new Error('googleApiKey is required for provider=google');

      return callGemini({
        apiKey: req.googleApiKey,
        model: req.model,
        messages: messages.map((m) => ({ role: m.role === 'developer' ? 'system' : m.role, content: m.content })),
        timeoutMs,
        temperature,
        jsonMode,
      });
    }
  }
}

export type CapabilitySpec = {
  provider: LLMProvider;
  model: string;
  apiKey: string;
  timeoutMs?: number;
};

// Binds one provider + credential. Each call issues exactly one request.
export function createLLMCapability(spec: CapabilitySpec): LLMCapability {
  return (messages) =>
    callLLM({
      provider: spec.provider,
      model: spec.model,
      messages,
      openaiApiKey: spec.provider === 'openai' ? spec.apiKey : undefined,
      githubToken: spec.provider === 'github-models' ? spec.apiKey : undefined,
      googleApiKey: spec.provider === 'google' ? spec.apiKey : undefined,
      timeoutMs: spec.timeoutMs,
      temperature: 0,
      jsonMode: true,
    });
}
