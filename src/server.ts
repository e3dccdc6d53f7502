import 'dotenv/config';

import { createApp } from './app';
import { loadLLMSettings } from './config/llm';
import { AnalysisPipeline } from './services/analysisPipeline';
import { SampleJobMatchProvider } from './services/careerRecommendations';
import { LLMGenerativeClient } from './services/generativeClient';
import { createAnalysisStages } from './services/stages';
import { Logger } from './utils/Logger';

const settings = loadLLMSettings();
const pipeline = new AnalysisPipeline(createAnalysisStages(new LLMGenerativeClient(settings)));

const app = createApp({ pipeline, jobMatchProvider: new SampleJobMatchProvider() });

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason: unknown) => {
  void Logger.logBackendError('Server', reason || new Error('Unhandled promise rejection'), {
    Endpoint: 'Process',
    Status: 'UNHANDLED_REJECTION'
  }).catch(() => {
    console.error('Unhandled rejection:', reason);
  });
});

// Handle uncaught exceptions
process.on('uncaughtException', (error: Error) => {
  void Logger.logBackendError('Server', error, {
    Endpoint: 'Process',
    Status: 'UNCAUGHT_EXCEPTION'
  })
    .catch(() => {
      console.error('Uncaught exception:', error);
    })
    .finally(() => process.exit(1));
});

const port = Number(process.env.PORT || 4000);
app.listen(port, async () => {
  console.log(`[api] listening on http://localhost:${port}`);
  await Logger.logInfo('Server', 'Server started', {
    Endpoint: 'Server',
    Status: 'STARTED',
    ResponsePayload: { port, provider: settings.apiUrl }
  });
});
