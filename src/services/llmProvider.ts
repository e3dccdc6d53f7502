import fetch from 'node-fetch';
import type { JsonValue } from '../types/json';
import { isJsonObject } from '../utils/sanitize';

/**
 * Centralized LLM Provider Detection and Request/Response Handling
 * Automatically detects provider (OpenAI, Google Gemini, or Anthropic Claude) based on API URL or key format
 * Provides unified interface for making LLM requests regardless of provider
 */

export type LLMProvider = 'openai' | 'google' | 'anthropic';

export interface LLMRequestConfig {
  apiUrl: string;
  apiKey: string;
  model?: string;
}

export interface LLMRequestOptions {
  system?: string;
  prompt: string;
  temperature?: number;
  maxTokens?: number;
}

export interface LLMResponse {
  text: string;
  raw: JsonValue;
}

interface OpenAIRequestBody {
  model: string;
  messages: Array<{ role: 'system' | 'user'; content: string }>;
  max_tokens: number;
  temperature?: number;
}

interface AnthropicRequestBody {
  model: string;
  max_tokens: number;
  temperature?: number;
  system?: string;
  messages: Array<{ role: 'user'; content: Array<{ type: 'text'; text: string }> }>;
}

interface GoogleRequestBody {
  model?: string;
  systemInstruction?: { parts: Array<{ text: string }> };
  contents: Array<{ role: 'user'; parts: Array<{ text: string }> }>;
  generationConfig: { temperature?: number; maxOutputTokens: number };
}

export type LLMRequestBody = OpenAIRequestBody | AnthropicRequestBody | GoogleRequestBody;

const DEFAULT_MODELS: Record<Exclude<LLMProvider, 'google'>, string> = {
  openai: 'gpt-4.1-mini',
  anthropic: 'claude-3-5-sonnet-20241022',
};

const DEFAULT_MAX_TOKENS = 4096;

/**
 * Detects LLM provider based on API URL or API key format
 */
export function detectLLMProvider(apiUrl: string, apiKey: string): LLMProvider {
  const urlLower = apiUrl.toLowerCase();

  // Check URL first (most reliable)
  if (urlLower.includes('openai') || urlLower.includes('azure.openai.com')) {
    return 'openai';
  }
  if (urlLower.includes('anthropic') || urlLower.includes('claude')) {
    return 'anthropic';
  }
  if (urlLower.includes('google') || urlLower.includes('gemini') || urlLower.includes('generativelanguage.googleapis.com')) {
    return 'google';
  }

  // Anthropic keys start with 'sk-ant-', OpenAI keys with 'sk-'
  if (apiKey.startsWith('sk-ant-')) {
    return 'anthropic';
  }
  if (apiKey.startsWith('sk-')) {
    return 'openai';
  }

  return 'google';
}

/**
 * Builds request headers based on provider
 */
export function buildLLMHeaders(provider: LLMProvider, apiKey: string): Record<string, string> {
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
  };

  if (provider === 'openai') {
    headers['Authorization'] = `Bearer ${apiKey}`;
  } else if (provider === 'anthropic') {
    headers['x-api-key'] = apiKey;
    headers['anthropic-version'] = '2023-06-01';
  } else {
    headers['x-goog-api-key'] = apiKey;
  }

  return headers;
}

/**
 * Builds request body based on provider. The system text travels in the
 * provider's own system slot rather than being glued onto the prompt.
 */
export function buildLLMRequestBody(
  provider: LLMProvider,
  config: LLMRequestConfig,
  options: LLMRequestOptions
): LLMRequestBody {
  const { model } = config;
  const { system, prompt, temperature, maxTokens = DEFAULT_MAX_TOKENS } = options;

  if (provider === 'openai') {
    const messages: OpenAIRequestBody['messages'] = [];
    if (system) {
      messages.push({ role: 'system', content: system });
    }
    messages.push({ role: 'user', content: prompt });

    return {
      model: model ?? DEFAULT_MODELS.openai,
      messages,
      max_tokens: maxTokens,
      ...(temperature !== undefined ? { temperature } : {}),
    };
  }

  if (provider === 'anthropic') {
    return {
      model: model ?? DEFAULT_MODELS.anthropic,
      max_tokens: maxTokens,
      ...(temperature !== undefined ? { temperature } : {}),
      ...(system ? { system } : {}),
      messages: [
        {
          role: 'user',
          content: [{ type: 'text', text: prompt }],
        },
      ],
    };
  }

  // Google Gemini format
  return {
    ...(model ? { model } : {}),
    ...(system ? { systemInstruction: { parts: [{ text: system }] } } : {}),
    contents: [
      {
        role: 'user',
        parts: [{ text: prompt }],
      },
    ],
    generationConfig: {
      maxOutputTokens: maxTokens,
      ...(temperature !== undefined ? { temperature } : {}),
    },
  };
}

function field(value: JsonValue | undefined, key: string): JsonValue | undefined {
  return isJsonObject(value) ? value[key] : undefined;
}

function list(value: JsonValue | undefined): JsonValue[] {
  return Array.isArray(value) ? value : [];
}

/**
 * Parses LLM response based on provider
 */
export function parseLLMResponse(provider: LLMProvider, json: JsonValue): string {
  if (provider === 'openai') {
    // { choices: [{ message: { content: "..." } }] }
    for (const choice of list(field(json, 'choices'))) {
      const content = field(field(choice, 'message'), 'content');
      if (typeof content === 'string' && content) {
        return content;
      }
    }
    return '';
  }

  if (provider === 'anthropic') {
    // { content: [{ type: "text", text: "..." }] }
    let textContent = '';
    for (const item of list(field(json, 'content'))) {
      const text = field(item, 'text');
      if (field(item, 'type') === 'text' && typeof text === 'string') {
        textContent += text;
      }
    }
    return textContent;
  }

  // Google Gemini format
  for (const candidate of list(field(json, 'candidates'))) {
    const parts = [
      ...list(field(field(candidate, 'content'), 'parts')),
      ...list(field(field(candidate, 'output'), 'parts')),
    ];
    for (const part of parts) {
      const text = field(part, 'text');
      if (typeof text === 'string') {
        return text;
      }
    }
  }
  return '';
}

/**
 * Makes an LLM request with automatic provider detection
 */
export async function makeLLMRequest(
  config: LLMRequestConfig,
  options: LLMRequestOptions
): Promise<LLMResponse> {
  const provider = detectLLMProvider(config.apiUrl, config.apiKey);
  const headers = buildLLMHeaders(provider, config.apiKey);
  const body = buildLLMRequestBody(provider, config, options);

  const response = await fetch(config.apiUrl, {
    method: 'POST',
    headers,
    body: JSON.stringify(body),
  });

  const raw = await response.text();
  if (!response.ok) {
    throw new Error(`LLM request failed with status ${response.status}: ${raw.substring(0, 500)}`);
  }

  let json: JsonValue;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new Error(`LLM returned invalid JSON: ${raw.substring(0, 500)}`);
  }

  return {
    text: parseLLMResponse(provider, json),
    raw: json,
  };
}
