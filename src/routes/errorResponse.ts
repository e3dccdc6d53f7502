import type { Response } from 'express';
import { TransformUnavailableError, ValidationError } from '../errors';
import { Logger } from '../utils/Logger';

/**
 * Maps a failure to its HTTP response and logs it. Validation problems are
 * the caller's fault (400), an unreachable provider is 502, the rest is 500.
 */
export async function sendErrorResponse(
  res: Response,
  error: unknown,
  context: { category: string; endpoint: string; transactionId: string },
) {
  const metadata = { TransactionID: context.transactionId, Endpoint: context.endpoint };

  if (error instanceof ValidationError) {
    await Logger.logBackendError(context.category, error, { ...metadata, Status: 'VALIDATION_ERROR' });
    return res.status(error.status).json({ error: error.message });
  }

  if (error instanceof TransformUnavailableError) {
    await Logger.logBackendError(context.category, error, { ...metadata, Status: 'LLM_ERROR' });
    return res.status(error.status).json({
      error: 'Unable to analyze CV. Check the LLM configuration or credentials.',
      detail: error.message,
    });
  }

  await Logger.logBackendError(context.category, error, { ...metadata, Status: 'INTERNAL_ERROR' });
  return res.status(500).json({ error: 'Internal server error' });
}
