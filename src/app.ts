import express from 'express';
import cors from 'cors';

import { createAnalysisRouter } from './routes/analysis';
import { createCareersRouter } from './routes/careers';
import type { AnalysisPipeline } from './services/analysisPipeline';
import type { JobMatchProvider } from './services/careerRecommendations';
import { SUPPORTED_LANGUAGES } from './services/languageDetector';
import { Logger } from './utils/Logger';

export const SERVICE_NAME = 'CV Analysis API';
export const SERVICE_VERSION = '1.0.0';

export interface AppDependencies {
  pipeline: AnalysisPipeline;
  jobMatchProvider?: JobMatchProvider;
  allowedOrigins?: string[];
  bodyLimit?: string;
}

export function parseAllowedOrigins(value: string | undefined): string[] {
  return (value || '').split(',').map((s) => s.trim()).filter(Boolean);
}

function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status >= 400 && err.status < 500 ? err.status : undefined;
  }
  return undefined;
}

export function createApp(deps: AppDependencies) {
  const app = express();

  const bodyLimit = deps.bodyLimit || process.env.BODY_LIMIT || '10mb';
  const allowedOrigins = deps.allowedOrigins ?? parseAllowedOrigins(process.env.ALLOWED_ORIGINS);

  app.use(
    cors({
      origin: (origin, callback) => {
        if (!origin || allowedOrigins.length === 0 || allowedOrigins.includes(origin)) {
          return callback(null, true);
        }
        return callback(new Error('Not allowed by CORS'));
      },
      allowedHeaders: ['Content-Type'],
      methods: ['GET', 'POST', 'OPTIONS'],
    })
  );

  app.use(express.json({ limit: bodyLimit }));

  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.get('/', (_req, res) => {
    res.json({
      message: `Welcome to the ${SERVICE_NAME}`,
      version: SERVICE_VERSION,
      supported_languages: SUPPORTED_LANGUAGES,
      endpoints: {
        '/analyze-and-rewrite': 'Complete CV analysis and rewriting',
        '/recommend-careers': 'Get career recommendations based on CV',
        '/health': 'Liveness check',
      },
    });
  });

  app.use('/analyze-and-rewrite', createAnalysisRouter({ pipeline: deps.pipeline }));
  app.use('/recommend-careers', createCareersRouter({ jobMatchProvider: deps.jobMatchProvider }));

  // Global error handler middleware
  app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const status = clientErrorStatus(err);
    void Logger.logBackendError('Server', err, {
      Endpoint: req.path || 'Unknown',
      Status: status ? 'REQUEST_ERROR' : 'UNHANDLED_ERROR',
      RequestPayload: { method: req.method, path: req.path },
    }).catch((logError: unknown) => {
      console.error('Failed to log error:', err, logError);
    });

    if (status) {
      res.status(status).json({ error: err instanceof Error ? err.message : 'Bad request' });
      return;
    }
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
