/**
 * Response Assembler
 * Merges the stage outputs of one request into the final report.
 * Pure: no I/O, no logging. Missing fields fall back to empty values.
 */

import type {
  ATSCheckItem,
  ATSComplianceReport,
  CareerIdentification,
  CheckStatus,
  FinalCV,
  FinalReport,
  ImprovementNotes,
  ImprovementsSummary,
  LanguageCode,
  QualityReport,
  RewrittenExperience,
  SocialLinks,
  StageOutputs,
} from '../types/analysis';
import type { JsonObject } from '../types/json';
import {
  hasNumber,
  pickText,
  readNumber,
  readRecordList,
  readString,
  readStringList,
  readText,
} from '../utils/defaults';
import { getLanguageShortName } from './languageDetector';

export const TARGET_ATS_SCORE = 90;
export const DEFAULT_ATS_UPLIFT = 10;
export const MAX_ALTERNATIVE_CAREERS = 3;

export const MISSING_FOR_TARGET = [
  "Quantifiable metrics (e.g., 'Improved efficiency by 30%', 'Managed team of 5 engineers')",
  "Specific numbers (e.g., 'Served 10,000+ users daily', 'Generated $2M in revenue')",
  "Measurable achievements (e.g., 'Reduced costs by 25%', 'Increased customer satisfaction by 40%')",
  "Project scope details (e.g., 'Led 3 major projects over 6 months', 'Delivered to 50+ clients')",
];

export const BELOW_TARGET_RECOMMENDATION =
  'To reach a 90% ATS score, add specific quantifiable metrics to your achievements. ' +
  'Without concrete numbers the CV can be improved to roughly 75-80% ATS compliance through better language, structure and keywords. ' +
  'For 85-90% you need to provide measurable results from your work experience.';

export const TARGET_REACHED_MESSAGE = 'Excellent! Your CV meets high ATS standards.';

export const REWRITE_EXAMPLES = [
  "Instead of: 'Worked on projects' → Use: 'Led 5 cross-functional projects serving 50,000+ users'",
  "Instead of: 'Improved processes' → Use: 'Optimized workflow processes, reducing processing time by 35%'",
  "Instead of: 'Managed team' → Use: 'Managed team of 8 engineers, delivering 12 features in 6 months'",
];

export interface AssembleInput extends StageOutputs {
  socialLinks: SocialLinks;
  inputLanguage: LanguageCode;
  outputLanguage: LanguageCode;
}

/** Original skills first, then new suggestions; exact duplicates dropped. */
export function combineSkills(original: string[], suggested: string[]): string[] {
  return Array.from(new Set([...original, ...suggested]));
}

export function gapToTarget(atsScoreAfter: number): number {
  return Math.max(0, TARGET_ATS_SCORE - atsScoreAfter);
}

export function estimatedScoreAfter(rewrite: JsonObject, atsScoreBefore: number): number {
  return hasNumber(rewrite, 'estimated_new_ats_score')
    ? readNumber(rewrite, 'estimated_new_ats_score')
    : atsScoreBefore + DEFAULT_ATS_UPLIFT;
}

function normalizeStatus(value: string, fallback: CheckStatus): CheckStatus {
  const lower = value.trim().toLowerCase();
  return lower === 'pass' || lower === 'fail' ? lower : fallback;
}

function toCheckItems(records: JsonObject[], fallback: CheckStatus): ATSCheckItem[] {
  return records.map((check) => ({
    item: readString(check, 'item'),
    status: normalizeStatus(readString(check, 'status'), fallback),
    details: readString(check, 'details'),
  }));
}

export function buildQualityReport(quality: JsonObject): QualityReport {
  return {
    overall_score: readNumber(quality, 'overall_score'),
    strengths: readStringList(quality, 'strengths'),
    weaknesses: readStringList(quality, 'weaknesses'),
    suggestions: readStringList(quality, 'suggestions'),
  };
}

export function buildATSReport(ats: JsonObject): ATSComplianceReport {
  return {
    overall_score: readNumber(ats, 'overall_score'),
    passed_checks: toCheckItems(readRecordList(ats, 'passed_checks'), 'pass'),
    failed_checks: toCheckItems(readRecordList(ats, 'failed_checks'), 'fail'),
    critical_issues: readStringList(ats, 'critical_issues'),
    recommendations: readStringList(ats, 'recommendations'),
  };
}

export function buildCareerIdentification(career: JsonObject): CareerIdentification {
  return {
    recommended_career: readString(career, 'recommended_career', 'Unknown'),
    confidence: readNumber(career, 'confidence'),
    reasoning: readString(career, 'reasoning'),
    alternative_careers: readStringList(career, 'alternative_careers').slice(0, MAX_ALTERNATIVE_CAREERS),
  };
}

function toRewrittenExperience(entry: JsonObject): RewrittenExperience {
  return {
    position: readText(entry, 'position'),
    company: readText(entry, 'company'),
    duration: readText(entry, 'duration') || 'Not Specified',
    original_description: readText(entry, 'original_description'),
    rewritten_description: readText(entry, 'rewritten_description'),
    improvements: readStringList(entry, 'improvements'),
  };
}

function formatDelta(delta: number): string {
  return delta >= 0 ? `+${delta}` : String(delta);
}

export function describeImprovements(args: {
  inputLanguage: LanguageCode;
  outputLanguage: LanguageCode;
  experienceCount: number;
  suggestedSkillCount: number;
  atsScoreBefore: number;
  atsScoreAfter: number;
}): string[] {
  const { inputLanguage, outputLanguage, experienceCount, suggestedSkillCount, atsScoreBefore, atsScoreAfter } = args;
  const notes: string[] = [];

  if (inputLanguage !== outputLanguage) {
    notes.push(
      `Translated CV from ${getLanguageShortName(inputLanguage)} to ${getLanguageShortName(outputLanguage)}`,
    );
  }
  notes.push('Improved professional summary with strong action verbs and context');
  notes.push(`Enhanced ${experienceCount} experience descriptions with impact and scope`);
  if (suggestedSkillCount > 0) {
    notes.push(`Added ${suggestedSkillCount} suggested skills based on experience`);
  }
  notes.push(
    `Improved ATS compliance from ${atsScoreBefore}% to ${atsScoreAfter}% (${formatDelta(atsScoreAfter - atsScoreBefore)}%)`,
  );
  notes.push('Applied industry-specific keywords and professional terminology');

  return notes;
}

export function buildImprovementNotes(atsScoreBefore: number, atsScoreAfter: number): ImprovementNotes {
  const belowTarget = atsScoreAfter < TARGET_ATS_SCORE;
  return {
    original_ats_score: atsScoreBefore,
    improved_ats_score: atsScoreAfter,
    target_ats_score: TARGET_ATS_SCORE,
    gap_to_target: gapToTarget(atsScoreAfter),
    missing_for_90_percent: belowTarget ? [...MISSING_FOR_TARGET] : [],
    recommendation: belowTarget ? BELOW_TARGET_RECOMMENDATION : TARGET_REACHED_MESSAGE,
    examples: belowTarget ? [...REWRITE_EXAMPLES] : [],
  };
}

export function assembleReport(input: AssembleInput): FinalReport {
  const { parsed, quality, ats, rewrite, suggestedSkills, career, socialLinks, inputLanguage, outputLanguage } = input;

  const atsReport = buildATSReport(ats);
  const atsScoreBefore = atsReport.overall_score;
  const atsScoreAfter = estimatedScoreAfter(rewrite, atsScoreBefore);
  const experience = readRecordList(rewrite, 'rewritten_experience').map(toRewrittenExperience);

  const finalCv: FinalCV = {
    name: readText(parsed, 'name'),
    email: readText(parsed, 'email'),
    phone: readText(parsed, 'phone'),
    address: readText(parsed, 'address'),
    summary: readString(rewrite, 'rewritten_summary'),
    skills: combineSkills(readStringList(parsed, 'skills'), suggestedSkills),
    experience,
    education: readRecordList(parsed, 'education').map((entry) =>
      pickText(entry, ['degree', 'institution', 'year'] as const),
    ),
    projects: readRecordList(parsed, 'projects').map((entry) =>
      pickText(entry, ['title', 'description', 'technologies', 'metrics'] as const),
    ),
    languages: readRecordList(parsed, 'languages').map((entry) =>
      pickText(entry, ['language', 'proficiency'] as const),
    ),
    hobbies: readStringList(parsed, 'hobbies'),
    social_links: { ...socialLinks },
  };

  const improvementsSummary: ImprovementsSummary = {
    ats_score_before: atsScoreBefore,
    ats_score_after: atsScoreAfter,
    improvements_made: describeImprovements({
      inputLanguage,
      outputLanguage,
      experienceCount: experience.length,
      suggestedSkillCount: suggestedSkills.length,
      atsScoreBefore,
      atsScoreAfter,
    }),
    translation_applied: inputLanguage !== outputLanguage,
    input_language: inputLanguage,
    output_language: outputLanguage,
  };

  return {
    final_cv: finalCv,
    career_recommendation: buildCareerIdentification(career),
    improvements_summary: improvementsSummary,
    improvement_notes: buildImprovementNotes(atsScoreBefore, atsScoreAfter),
    quality_report: buildQualityReport(quality),
    ats_compliance: atsReport,
  };
}
