import { vi } from 'vitest';
import type { GenerationRequest, GenerativeClient } from '../src/services/generativeClient';
import type { StageName } from '../src/types/analysis';

export const ENGLISH_CV =
  'Jane Doe, data engineer based in Berlin. I have six years of experience designing and running data pipelines ' +
  'for an online retailer, where I am responsible for the nightly batch jobs and the reporting database. ' +
  'Before that I worked as a software developer on the checkout team of the same company.';

const PARSED = {
  name: 'Jane Doe',
  email: 'jane@example.com',
  phone: null,
  summary: '',
  skills: ['Python', 'SQL'],
  experience: [{ position: 'Data Engineer', company: 'Retail GmbH', duration: null, description: 'Ran pipelines' }],
  education: [],
  hobbies: [],
};

export const REPLIES: Record<StageName, string> = {
  parse: JSON.stringify(PARSED),
  quality: JSON.stringify({ overall_score: 68, strengths: ['Focused'], weaknesses: ['No metrics'], suggestions: [] }),
  ats: JSON.stringify({ overall_score: 62, passed_checks: [], failed_checks: [], critical_issues: [], recommendations: [] }),
  skills: JSON.stringify(['Docker', 'SQL', 'Apache Airflow']),
  career: JSON.stringify({
    recommended_career: 'Dateningenieur',
    confidence: 88,
    reasoning: 'Langjährige Erfahrung mit Datenpipelines',
    alternative_careers: ['Data Scientist', 'Backend-Entwickler'],
  }),
  rewrite: JSON.stringify({
    rewritten_summary: 'Dateningenieurin mit sechs Jahren Erfahrung im Aufbau zuverlässiger Datenpipelines.',
    rewritten_experience: [
      {
        position: 'Dateningenieurin',
        company: 'Retail GmbH',
        duration: '2019 - heute',
        original_description: 'Ran pipelines',
        rewritten_description: 'Betrieb und optimierte nächtliche Batch-Pipelines',
        improvements: ['Starkes Verb'],
      },
    ],
    estimated_new_ats_score: 79,
  }),
};

export function fakeClient(overrides: Partial<Record<StageName, string | Error>> = {}) {
  const generate = vi.fn(async ({ stage }: GenerationRequest) => {
    const reply = overrides[stage] ?? REPLIES[stage];
    if (reply instanceof Error) throw reply;
    return reply;
  });
  const client: GenerativeClient = { generate };
  return { client, generate };
}

