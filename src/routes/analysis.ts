import { Router } from 'express';
import { v4 as uuid } from 'uuid';
import { InvalidRequestError } from '../errors';
import type { AnalysisPipeline } from '../services/analysisPipeline';
import { SOCIAL_PLATFORMS, type SocialLinkInput } from '../services/socialLinks';
import type { JsonObject } from '../types/json';
import { readString } from '../utils/defaults';
import { isJsonObject } from '../utils/sanitize';
import { sendErrorResponse } from './errorResponse';

const DATA_URL_PREFIX = /^data:[^;,]*;base64,/;

export function decodeBase64File(fileBase64: string): Buffer {
  return Buffer.from(fileBase64.replace(DATA_URL_PREFIX, ''), 'base64');
}

function socialLinksFrom(body: JsonObject): SocialLinkInput {
  const links: SocialLinkInput = {};
  for (const platform of SOCIAL_PLATFORMS) {
    links[platform] = body[platform];
  }
  return links;
}

export function createAnalysisRouter(deps: { pipeline: AnalysisPipeline }) {
  const analysisRouter = Router();

  analysisRouter.post('/', async (req, res) => {
    const transactionId = `analyze-and-rewrite-${uuid()}`;
    try {
      const body: unknown = req.body;
      if (!isJsonObject(body)) {
        throw new InvalidRequestError('Request body must be a JSON object');
      }

      const fileName = readString(body, 'fileName').trim();
      const fileBase64 = readString(body, 'fileBase64');
      if (!fileName) {
        throw new InvalidRequestError('fileName is required');
      }
      if (!fileBase64) {
        throw new InvalidRequestError('fileBase64 is required');
      }

      const report = await deps.pipeline.run({
        document: { fileName, data: decodeBase64File(fileBase64) },
        outputLanguage: readString(body, 'output_language') || undefined,
        socialLinks: socialLinksFrom(body),
        transactionId,
      });
      return res.json(report);
    } catch (error) {
      return sendErrorResponse(res, error, {
        category: 'Analysis',
        endpoint: 'POST /analyze-and-rewrite',
        transactionId,
      });
    }
  });

  return analysisRouter;
}
