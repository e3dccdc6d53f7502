import type { StageName } from '../types/analysis';
import type { JsonObject, JsonValue } from '../types/json';
import { toStringList } from '../utils/defaults';
import type { GenerativeClient } from './generativeClient';
import {
  atsInstructions,
  careerInstructions,
  parseInstructions,
  qualityInstructions,
  rewriteInstructions,
  skillsInstructions,
} from './prompts';
import { defineTransformStage, type TransformStage } from './transformStage';

export const MAX_SUGGESTED_SKILLS = 10;

const LANGUAGE_WORDS = [
  'english',
  'englisch',
  'german',
  'deutsch',
  'arabic',
  'arabisch',
  'french',
  'spanish',
  'italian',
  'turkish',
  'proficiency',
  'sprachkenntnisse',
  'language skills',
  'language proficiency',
  'native speaker',
  'العربية',
  'الإنجليزية',
  'الألمانية',
];

const SOFT_SKILL_WORDS = [
  'communication',
  'kommunikation',
  'leadership',
  'führung',
  'teamwork',
  'teamfähigkeit',
  'team player',
  'problem solving',
  'problem-solving',
  'time management',
  'zeitmanagement',
  'adaptability',
  'creativity',
  'interpersonal',
  'soft skill',
  'soft skills',
  'التواصل',
  'القيادة',
];

const CEFR_LEVEL = /\b[abc][12]\b/i;
const TRAILING_SKILLS = /\s+skills?$/;

/**
 * True for things that are not technical skills: spoken languages and their
 * levels, and soft skills. Word lists cover the three output languages.
 *
 * Language terms match anywhere in the skill. Soft-skill terms only match the
 * whole skill, optionally followed by "skills", so "Communication Protocols"
 * stays while "Communication Skills" goes.
 */
export function isNonTechnicalSkill(skill: string): boolean {
  const lower = skill.trim().toLowerCase();
  if (CEFR_LEVEL.test(lower)) return true;

  const words = lower.split(/[^\p{L}-]+/u).filter(Boolean);
  const mentionsLanguage = LANGUAGE_WORDS.some((term) =>
    term.includes(' ') ? lower.includes(term) : words.includes(term),
  );
  if (mentionsLanguage) return true;

  const bare = lower.replace(TRAILING_SKILLS, '');
  return SOFT_SKILL_WORDS.some((term) => term === lower || term === bare);
}

export function filterSuggestedSkills(values: JsonValue[]): string[] {
  const seen = new Set<string>();
  const skills: string[] = [];
  for (const value of toStringList(values)) {
    const skill = value.trim();
    const key = skill.toLowerCase();
    if (!skill || seen.has(key) || isNonTechnicalSkill(skill)) continue;
    seen.add(key);
    skills.push(skill);
  }
  return skills.slice(0, MAX_SUGGESTED_SKILLS);
}

export interface AnalysisStages {
  parse: TransformStage<JsonObject>;
  quality: TransformStage<JsonObject>;
  ats: TransformStage<JsonObject>;
  skills: TransformStage<string[]>;
  career: TransformStage<JsonObject>;
  rewrite: TransformStage<JsonObject>;
}

const emptyObject = (): JsonObject => ({});
const keepObject = (value: JsonObject): JsonObject => value;

function objectStage(
  client: GenerativeClient,
  name: StageName,
  instructions: (languageName: string) => string,
): TransformStage<JsonObject> {
  return defineTransformStage(client, {
    name,
    shape: 'object',
    instructions,
    finalize: keepObject,
    empty: emptyObject,
  });
}

/** The six stages the analysis pipeline runs, all bound to one client. */
export function createAnalysisStages(client: GenerativeClient): AnalysisStages {
  return {
    parse: objectStage(client, 'parse', parseInstructions),
    quality: objectStage(client, 'quality', qualityInstructions),
    ats: objectStage(client, 'ats', atsInstructions),
    skills: defineTransformStage(client, {
      name: 'skills',
      shape: 'array',
      instructions: skillsInstructions,
      finalize: filterSuggestedSkills,
      empty: () => [],
    }),
    career: objectStage(client, 'career', careerInstructions),
    rewrite: objectStage(client, 'rewrite', rewriteInstructions),
  };
}
