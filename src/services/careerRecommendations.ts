import { v4 as uuid } from 'uuid';
import { InvalidRequestError, InvalidTierError } from '../errors';
import type { JsonObject } from '../types/json';

export const TIERS = ['free', 'premium'] as const;
export type Tier = (typeof TIERS)[number];

export const DEFAULT_LOCATION = 'Germany';
export const DEFAULT_LIMIT = 10;

export interface JobListing {
  id: string;
  title: string;
  company: string;
  location: string;
  job_type?: string;
  experience_level?: string;
  description?: string;
  required_skills: string[];
  salary_min?: number;
  salary_max?: number;
  salary_currency?: string;
  source: string;
  posted_at?: string;
  url?: string;
}

export interface ImprovementSuggestion {
  category: string;
  suggestion: string;
}

export interface JobMatch {
  job: JobListing;
  overall_match_score: number;
  skills_match_score?: number;
  experience_match_score?: number;
  education_match_score?: number;
  language_match_score?: number;
  matched_skills: string[];
  missing_skills: string[];
  improvement_suggestions: ImprovementSuggestion[];
  estimated_preparation_time?: string;
}

export interface JobSearchResult {
  totalJobsSearched: number;
  matches: JobMatch[];
}

/**
 * Source of job matches for a CV. Real implementations sit on job-board
 * connectors plus a scoring function.
 */
export interface JobMatchProvider {
  findMatches(args: { cvData: JsonObject; tier: Tier; location: string }): Promise<JobSearchResult>;
}

export interface CareerRecommendationResponse {
  tier: Tier;
  location: string;
  total_jobs_searched: number;
  recommendations: JobMatch[];
  message: string;
}

/** Fixed placeholder data until a job-board integration exists. */
export class SampleJobMatchProvider implements JobMatchProvider {
  async findMatches({ tier }: { cvData: JsonObject; tier: Tier; location: string }): Promise<JobSearchResult> {
    const job: JobListing = {
      id: uuid(),
      title: 'Data Scientist',
      company: 'Tech Company GmbH',
      location: 'Berlin, Germany',
      job_type: 'Full-time',
      experience_level: 'Mid-level',
      description: 'We are looking for a Data Scientist...',
      required_skills: ['Python', 'Machine Learning', 'SQL'],
      salary_min: 60000,
      salary_max: 80000,
      salary_currency: 'EUR',
      source: tier === 'free' ? 'BA-API' : 'LinkedIn',
      posted_at: new Date().toISOString(),
      url: 'https://example.com/job/123',
    };

    return {
      totalJobsSearched: 1,
      matches: [
        {
          job,
          overall_match_score: 85,
          skills_match_score: 90,
          experience_match_score: 80,
          education_match_score: 85,
          language_match_score: 95,
          matched_skills: ['Python', 'Machine Learning'],
          missing_skills: ['Deep Learning', 'TensorFlow'],
          improvement_suggestions: [
            { category: 'skills', suggestion: 'Learn Deep Learning frameworks like TensorFlow or PyTorch' },
            { category: 'experience', suggestion: 'Work on more ML projects to gain hands-on experience' },
          ],
          estimated_preparation_time: '2-3 months',
        },
      ],
    };
  }
}

export function isTier(value: string): value is Tier {
  return TIERS.some((tier) => tier === value);
}

export interface RecommendCareersInput {
  cvData: JsonObject;
  tier?: string;
  location?: string;
  limit?: number;
}

export async function recommendCareers(
  input: RecommendCareersInput,
  provider: JobMatchProvider = new SampleJobMatchProvider(),
): Promise<CareerRecommendationResponse> {
  const tier = input.tier ?? 'free';
  if (!isTier(tier)) {
    throw new InvalidTierError(tier);
  }

  const limit = input.limit ?? DEFAULT_LIMIT;
  if (!Number.isInteger(limit) || limit < 1) {
    throw new InvalidRequestError('limit must be a positive integer');
  }

  const location = input.location?.trim() || DEFAULT_LOCATION;
  const { totalJobsSearched, matches } = await provider.findMatches({ cvData: input.cvData, tier, location });
  const recommendations = matches.slice(0, limit);

  return {
    tier,
    location,
    total_jobs_searched: totalJobsSearched,
    recommendations,
    message: `Showing top ${recommendations.length} recommendations from ${tier} tier`,
  };
}
