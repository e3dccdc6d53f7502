import type { JsonObject } from './json';

export type LanguageCode = 'en' | 'de' | 'ar';

export type StageName = 'parse' | 'quality' | 'ats' | 'skills' | 'career' | 'rewrite';

export type SocialPlatform =
  | 'linkedin'
  | 'github'
  | 'kaggle'
  | 'portfolio'
  | 'stackoverflow'
  | 'medium'
  | 'twitter';

export type SocialLinks = Partial<Record<SocialPlatform, string>>;

export interface RawDocument {
  fileName: string;
  data: Buffer;
}

export interface ExperienceEntry {
  position?: string;
  company?: string;
  duration?: string;
  description?: string;
}

export interface EducationEntry {
  degree?: string;
  institution?: string;
  year?: string;
}

export interface ProjectEntry {
  title?: string;
  description?: string;
  technologies?: string;
  metrics?: string;
}

export interface LanguageEntry {
  language?: string;
  proficiency?: string;
}

export interface QualityReport {
  overall_score: number;
  strengths: string[];
  weaknesses: string[];
  suggestions: string[];
}

export type CheckStatus = 'pass' | 'fail';

export interface ATSCheckItem {
  item: string;
  status: CheckStatus;
  details: string;
}

export interface ATSComplianceReport {
  overall_score: number;
  passed_checks: ATSCheckItem[];
  failed_checks: ATSCheckItem[];
  critical_issues: string[];
  recommendations: string[];
}

export interface RewrittenExperience {
  position: string;
  company: string;
  duration: string;
  original_description: string;
  rewritten_description: string;
  improvements: string[];
}

export interface CareerIdentification {
  recommended_career: string;
  confidence: number;
  reasoning: string;
  alternative_careers: string[];
}

export interface FinalCV {
  name: string;
  email: string;
  phone: string;
  address: string;
  summary: string;
  skills: string[];
  experience: RewrittenExperience[];
  education: EducationEntry[];
  projects: ProjectEntry[];
  languages: LanguageEntry[];
  hobbies: string[];
  social_links: SocialLinks;
}

export interface ImprovementsSummary {
  ats_score_before: number;
  ats_score_after: number;
  improvements_made: string[];
  translation_applied: boolean;
  input_language: LanguageCode;
  output_language: LanguageCode;
}

export interface ImprovementNotes {
  original_ats_score: number;
  improved_ats_score: number;
  target_ats_score: number;
  gap_to_target: number;
  missing_for_90_percent: string[];
  recommendation: string;
  examples: string[];
}

export interface FinalReport {
  final_cv: FinalCV;
  career_recommendation: CareerIdentification;
  improvements_summary: ImprovementsSummary;
  improvement_notes: ImprovementNotes;
  quality_report: QualityReport;
  ats_compliance: ATSComplianceReport;
}

/**
 * Raw stage outputs as they come back from the provider, after JSON parsing.
 * Fields are read through the accessors in utils/defaults.
 */
export interface StageOutputs {
  parsed: JsonObject;
  quality: JsonObject;
  ats: JsonObject;
  rewrite: JsonObject;
  suggestedSkills: string[];
  career: JsonObject;
}
