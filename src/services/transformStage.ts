import { MalformedTransformOutputError } from '../errors';
import type { LanguageCode, StageName } from '../types/analysis';
import type { JsonObject, JsonValue } from '../types/json';
import { isJsonObject } from '../utils/sanitize';
import type { GenerativeClient } from './generativeClient';
import { DEFAULT_LANGUAGE, getLanguageName } from './languageDetector';

export type OutputShape = 'object' | 'array';

type ShapeValue<S extends OutputShape> = S extends 'object' ? JsonObject : JsonValue[];

export interface TransformStageDefinition<S extends OutputShape, T> {
  name: StageName;
  shape: S;
  /** Builds the system instruction; receives the output language's display name. */
  instructions: (languageName: string) => string;
  /** Post-processing applied to a well-shaped result. */
  finalize: (value: ShapeValue<S>) => T;
  /** Value used when the provider answers with something unusable. */
  empty: () => T;
}

export interface TransformStage<T> {
  readonly name: StageName;
  /** Sends one payload through the stage. */
  run(payload: string, outputLanguage?: LanguageCode): Promise<T>;
  empty(): T;
}

/**
 * Candidate JSON snippets in the order they are tried: the whole reply, a
 * ```json fence, any fence, then the outermost object or array.
 */
export function extractJsonCandidates(raw: string): string[] {
  const trimmed = raw.trim();
  const candidates: string[] = [];
  if (trimmed) candidates.push(trimmed);

  const jsonFence = trimmed.match(/```json\s*([\s\S]*?)```/i);
  if (jsonFence?.[1]) candidates.push(jsonFence[1].trim());

  const genericFence = trimmed.match(/```\s*([\s\S]*?)```/);
  if (genericFence?.[1]) candidates.push(genericFence[1].trim());

  const looseObject = trimmed.match(/{[\s\S]*}/);
  if (looseObject?.[0]) candidates.push(looseObject[0]);

  const looseArray = trimmed.match(/\[[\s\S]*\]/);
  if (looseArray?.[0]) candidates.push(looseArray[0]);

  return candidates;
}

function tryParse(candidate: string): JsonValue | undefined {
  try {
    const parsed: JsonValue = JSON.parse(candidate);
    return parsed;
  } catch {
    return undefined;
  }
}

export function parseStageOutput(stage: StageName, raw: string, shape: 'object'): JsonObject;
export function parseStageOutput(stage: StageName, raw: string, shape: 'array'): JsonValue[];
export function parseStageOutput(stage: StageName, raw: string, shape: OutputShape): JsonObject | JsonValue[];
export function parseStageOutput(stage: StageName, raw: string, shape: OutputShape): JsonObject | JsonValue[] {
  for (const candidate of extractJsonCandidates(raw)) {
    const parsed = tryParse(candidate);
    if (shape === 'object' && isJsonObject(parsed)) return parsed;
    if (shape === 'array' && Array.isArray(parsed)) return parsed;
  }
  throw new MalformedTransformOutputError(stage, raw.substring(0, 500));
}

function matchesShape<S extends OutputShape>(shape: S, value: JsonObject | JsonValue[]): value is ShapeValue<S> {
  return shape === 'object' ? isJsonObject(value) : Array.isArray(value);
}

/**
 * One parametrized call to the generative capability. Every stage shares
 * this contract and differs only in its instruction and expected shape.
 */
export function defineTransformStage<S extends OutputShape, T>(
  client: GenerativeClient,
  definition: TransformStageDefinition<S, T>,
): TransformStage<T> {
  const { name, shape } = definition;

  return {
    name,
    empty: definition.empty,
    async run(payload: string, outputLanguage: LanguageCode = DEFAULT_LANGUAGE): Promise<T> {
      const system = definition.instructions(getLanguageName(outputLanguage));
      const text = await client.generate({ stage: name, system, input: payload });
      const parsed = parseStageOutput(name, text, shape);
      if (!matchesShape(shape, parsed)) {
        throw new MalformedTransformOutputError(name, text.substring(0, 500));
      }
      return definition.finalize(parsed);
    },
  };
}
