import { ConfigurationError } from '../errors';

const DEFAULT_API_URL = 'https://api.openai.com/v1/chat/completions';

export interface LLMSettings {
  apiUrl: string;
  apiKey: string;
  model?: string;
  temperature: number;
  maxTokens: number;
}

function readNumberEnv(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${name} must be a number, got '${raw}'`);
  }
  return value;
}

/**
 * Reads the generative provider settings from the environment.
 * Called once at startup; the result is shared read-only by every request.
 */
export function loadLLMSettings(env: NodeJS.ProcessEnv = process.env): LLMSettings {
  const apiKey = env.LLM_API_KEY?.trim();
  if (!apiKey) {
    throw new ConfigurationError('LLM_API_KEY not found in environment. Please set it in .env.');
  }

  const apiUrl = env.LLM_API_URL?.trim() || DEFAULT_API_URL;
  const model = env.LLM_MODEL?.trim() || undefined;

  return {
    apiUrl,
    apiKey,
    model,
    temperature: readNumberEnv(env, 'LLM_TEMPERATURE', 0.3),
    maxTokens: readNumberEnv(env, 'LLM_MAX_TOKENS', 4096),
  };
}
