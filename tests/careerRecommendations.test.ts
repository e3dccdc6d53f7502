import { describe, expect, it } from 'vitest';
import { InvalidRequestError, InvalidTierError } from '../src/errors';
import {
  SampleJobMatchProvider,
  recommendCareers,
  type JobMatch,
  type JobMatchProvider,
} from '../src/services/careerRecommendations';

const cvData = { name: 'Jane Doe', skills: ['Python', 'SQL'] };

describe('recommendCareers', () => {
  it('uses the free tier in Germany by default', async () => {
    const result = await recommendCareers({ cvData });

    expect(result.tier).toBe('free');
    expect(result.location).toBe('Germany');
    expect(result.total_jobs_searched).toBe(1);
    expect(result.recommendations).toHaveLength(1);
    expect(result.recommendations[0].job.source).toBe('BA-API');
    expect(result.message).toBe('Showing top 1 recommendations from free tier');
  });

  it('draws premium results from another source', async () => {
    const result = await recommendCareers({ cvData, tier: 'premium', location: 'Remote' });

    expect(result.location).toBe('Remote');
    expect(result.recommendations[0].job.source).toBe('LinkedIn');
    expect(result.message).toBe('Showing top 1 recommendations from premium tier');
  });

  it('rejects an unknown tier', async () => {
    await expect(recommendCareers({ cvData, tier: 'gold' })).rejects.toBeInstanceOf(InvalidTierError);
    await expect(recommendCareers({ cvData, tier: 'gold' })).rejects.toThrow(
      "Invalid tier 'gold'. Must be 'free' or 'premium'",
    );
  });

  it('rejects a limit below one', async () => {
    await expect(recommendCareers({ cvData, limit: 0 })).rejects.toBeInstanceOf(InvalidRequestError);
    await expect(recommendCareers({ cvData, limit: 1.5 })).rejects.toBeInstanceOf(InvalidRequestError);
  });

  it('truncates the provider results to the limit', async () => {
    const sample = await new SampleJobMatchProvider().findMatches({ cvData, tier: 'free', location: 'Germany' });
    const match: JobMatch = sample.matches[0];
    const provider: JobMatchProvider = {
      findMatches: async () => ({ totalJobsSearched: 40, matches: [match, match, match] }),
    };

    const result = await recommendCareers({ cvData, limit: 2 }, provider);

    expect(result.total_jobs_searched).toBe(40);
    expect(result.recommendations).toHaveLength(2);
    expect(result.message).toBe('Showing top 2 recommendations from free tier');
  });

  it('gives every sample listing a fresh id', async () => {
    const provider = new SampleJobMatchProvider();
    const first = await provider.findMatches({ cvData, tier: 'free', location: 'Germany' });
    const second = await provider.findMatches({ cvData, tier: 'free', location: 'Germany' });

    expect(first.matches[0].job.id).not.toBe(second.matches[0].job.id);
  });
});
