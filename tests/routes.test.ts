import request from 'supertest';
import { beforeEach, describe, expect, it, vi } from 'vitest';

const docxMocks = vi.hoisted(() => ({
  extractRawText: vi.fn(),
}));

vi.mock('mammoth', () => ({
  default: { extractRawText: docxMocks.extractRawText },
}));

vi.mock('pdfjs-dist/legacy/build/pdf.mjs', () => ({
  getDocument: vi.fn(),
}));

import { createApp } from '../src/app';
import { TransformUnavailableError } from '../src/errors';
import { AnalysisPipeline } from '../src/services/analysisPipeline';
import { createAnalysisStages } from '../src/services/stages';
import type { StageName } from '../src/types/analysis';
import { ENGLISH_CV, fakeClient } from './helpers';

function buildApp(overrides: Partial<Record<StageName, string | Error>> = {}) {
  const { client, generate } = fakeClient(overrides);
  const app = createApp({ pipeline: new AnalysisPipeline(createAnalysisStages(client)), allowedOrigins: [] });
  return { app, generate };
}

const fileBase64 = Buffer.from('PK').toString('base64');

describe('GET endpoints', () => {
  it('reports health', async () => {
    const res = await request(buildApp().app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true });
  });

  it('describes the service', async () => {
    const res = await request(buildApp().app).get('/');

    expect(res.status).toBe(200);
    expect(res.body.supported_languages).toEqual({
      en: 'English',
      de: 'German (Deutsch)',
      ar: 'Arabic (العربية)',
    });
    expect(Object.keys(res.body.endpoints)).toEqual(['/analyze-and-rewrite', '/recommend-careers', '/health']);
  });
});

describe('POST /analyze-and-rewrite', () => {
  beforeEach(() => {
    docxMocks.extractRawText.mockReset();
    docxMocks.extractRawText.mockResolvedValue({ value: ENGLISH_CV, messages: [] });
  });

  it('returns the merged report', async () => {
    const res = await request(buildApp().app)
      .post('/analyze-and-rewrite')
      .send({ fileName: 'jane.docx', fileBase64, output_language: 'de', github: 'https://github.com/jane' });

    expect(res.status).toBe(200);
    expect(res.body.final_cv.name).toBe('Jane Doe');
    expect(res.body.final_cv.social_links).toEqual({ github: 'https://github.com/jane' });
    expect(res.body.improvements_summary.translation_applied).toBe(true);
    expect(docxMocks.extractRawText).toHaveBeenCalledWith({ buffer: Buffer.from('PK') });
  });

  it('accepts the file as a data URL', async () => {
    const res = await request(buildApp().app)
      .post('/analyze-and-rewrite')
      .send({ fileName: 'jane.docx', fileBase64: `data:application/octet-stream;base64,${fileBase64}` });

    expect(res.status).toBe(200);
    expect(docxMocks.extractRawText).toHaveBeenCalledWith({ buffer: Buffer.from('PK') });
  });

  it('requires the file', async () => {
    const res = await request(buildApp().app).post('/analyze-and-rewrite').send({ fileName: 'jane.docx' });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'fileBase64 is required' });
  });

  it('rejects a text file without calling the provider', async () => {
    const { app, generate } = buildApp();

    const res = await request(app)
      .post('/analyze-and-rewrite')
      .send({ fileName: 'resume.txt', fileBase64: Buffer.from(ENGLISH_CV).toString('base64') });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'Unsupported file format: txt' });
    expect(generate).not.toHaveBeenCalled();
  });

  it('answers 400 to a Word file that cannot be read', async () => {
    docxMocks.extractRawText.mockRejectedValue(new Error("Can't find end of central directory"));
    const { app, generate } = buildApp();

    const res = await request(app).post('/analyze-and-rewrite').send({ fileName: 'old.doc', fileBase64 });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      error: "Could not read the document 'old.doc'. Please upload a valid PDF or DOCX file.",
    });
    expect(generate).not.toHaveBeenCalled();
  });

  it('rejects a GitHub link on another host', async () => {
    const res = await request(buildApp().app)
      .post('/analyze-and-rewrite')
      .send({ fileName: 'jane.docx', fileBase64, github: 'https://notgithub.com/jane' });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "Invalid GitHub URL. Must contain 'github.com'" });
  });

  it('answers 502 when the provider is unavailable', async () => {
    const { app } = buildApp({ rewrite: new TransformUnavailableError('rewrite', 'status 503') });

    const res = await request(app).post('/analyze-and-rewrite').send({ fileName: 'jane.docx', fileBase64 });

    expect(res.status).toBe(502);
    expect(res.body).toEqual({
      error: 'Unable to analyze CV. Check the LLM configuration or credentials.',
      detail: "Transform stage 'rewrite' unavailable: status 503",
    });
  });

  it('answers 400 to a body that is not JSON', async () => {
    const res = await request(buildApp().app)
      .post('/analyze-and-rewrite')
      .set('Content-Type', 'application/json')
      .send('{"fileName":');

    expect(res.status).toBe(400);
  });
});

describe('POST /recommend-careers', () => {
  it('returns sample recommendations for the requested tier', async () => {
    const res = await request(buildApp().app)
      .post('/recommend-careers?tier=premium&location=Munich&limit=5')
      .send({ name: 'Jane Doe', skills: ['Python'] });

    expect(res.status).toBe(200);
    expect(res.body.tier).toBe('premium');
    expect(res.body.location).toBe('Munich');
    expect(res.body.recommendations[0].job.source).toBe('LinkedIn');
    expect(res.body.message).toBe('Showing top 1 recommendations from premium tier');
  });

  it('rejects an unknown tier', async () => {
    const res = await request(buildApp().app).post('/recommend-careers?tier=gold').send({ name: 'Jane Doe' });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "Invalid tier 'gold'. Must be 'free' or 'premium'" });
  });

  it('rejects a limit that is not a positive integer', async () => {
    const res = await request(buildApp().app).post('/recommend-careers?limit=abc').send({ name: 'Jane Doe' });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'limit must be a positive integer' });
  });
});
