import { Router } from 'express';
import { v4 as uuid } from 'uuid';
import { InvalidRequestError } from '../errors';
import { recommendCareers, type JobMatchProvider } from '../services/careerRecommendations';
import { isJsonObject } from '../utils/sanitize';
import { sendErrorResponse } from './errorResponse';

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function parseLimit(value: unknown): number | undefined {
  const raw = queryString(value);
  if (raw === undefined || raw.trim() === '') return undefined;
  if (!/^\d+$/.test(raw.trim())) {
    throw new InvalidRequestError('limit must be a positive integer');
  }
  return Number(raw);
}

export function createCareersRouter(deps: { jobMatchProvider?: JobMatchProvider } = {}) {
  const careersRouter = Router();

  // Body is a CV structure as returned by /analyze-and-rewrite
  careersRouter.post('/', async (req, res) => {
    const transactionId = `recommend-careers-${uuid()}`;
    try {
      const body: unknown = req.body;
      if (!isJsonObject(body)) {
        throw new InvalidRequestError('Request body must be a JSON object with the CV data');
      }

      const result = await recommendCareers(
        {
          cvData: body,
          tier: queryString(req.query.tier),
          location: queryString(req.query.location),
          limit: parseLimit(req.query.limit),
        },
        deps.jobMatchProvider,
      );
      return res.json(result);
    } catch (error) {
      return sendErrorResponse(res, error, {
        category: 'Careers',
        endpoint: 'POST /recommend-careers',
        transactionId,
      });
    }
  });

  return careersRouter;
}
