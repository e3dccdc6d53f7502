import type { LLMSettings } from '../config/llm';
import { TransformUnavailableError, describeError } from '../errors';
import type { StageName } from '../types/analysis';
import { makeLLMRequest } from './llmProvider';

export interface GenerationRequest {
  stage: StageName;
  system: string;
  input: string;
}

/**
 * The external generative capability: instruction + payload in, raw text out.
 * Implementations throw TransformUnavailableError when the provider cannot
 * answer; they never retry.
 */
export interface GenerativeClient {
  generate(request: GenerationRequest): Promise<string>;
}

export class LLMGenerativeClient implements GenerativeClient {
  constructor(private readonly settings: LLMSettings) {}

  async generate({ stage, system, input }: GenerationRequest): Promise<string> {
    const { apiUrl, apiKey, model, temperature, maxTokens } = this.settings;
    try {
      const response = await makeLLMRequest(
        { apiUrl, apiKey, model },
        { system, prompt: input, temperature, maxTokens },
      );
      return response.text;
    } catch (error) {
      throw new TransformUnavailableError(stage, describeError(error), { cause: error });
    }
  }
}
