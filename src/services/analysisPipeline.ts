import { v4 as uuid } from 'uuid';
import {
  InsufficientTextError,
  MalformedTransformOutputError,
  TransformUnavailableError,
  UnsupportedLanguageError,
  ValidationError,
} from '../errors';
import type { FinalReport, LanguageCode, RawDocument, SocialLinks } from '../types/analysis';
import { Logger } from '../utils/Logger';
import { sanitizeObject } from '../utils/sanitize';
import { extractDocumentText } from './documentExtractor';
import { detectLanguage, isLanguageCode, supportedLanguageCodes } from './languageDetector';
import { assembleReport } from './responseAssembler';
import { validateSocialLinks, type SocialLinkInput } from './socialLinks';
import type { AnalysisStages } from './stages';
import type { TransformStage } from './transformStage';

export const MIN_TEXT_LENGTH = 50;
export const DEFAULT_OUTPUT_LANGUAGE: LanguageCode = 'de';

export type PipelineState =
  | 'ReceivedFile'
  | 'Extracted'
  | 'LanguageDetected'
  | 'Parsed'
  | 'Sanitized'
  | 'TransformsDispatched'
  | 'TransformsCompleted'
  | 'Assembled'
  | 'Returned'
  | 'Rejected'
  | 'TransformFailed';

const FORWARD: Readonly<Record<PipelineState, readonly PipelineState[]>> = Object.freeze({
  ReceivedFile: ['Extracted', 'Rejected'],
  Extracted: ['LanguageDetected', 'Rejected'],
  LanguageDetected: ['Parsed', 'TransformFailed'],
  Parsed: ['Sanitized'],
  Sanitized: ['TransformsDispatched'],
  TransformsDispatched: ['TransformsCompleted', 'TransformFailed'],
  TransformsCompleted: ['Assembled'],
  Assembled: ['Returned'],
  Returned: [],
  Rejected: [],
  TransformFailed: [],
});

export interface AnalysisRequest {
  document: RawDocument;
  outputLanguage?: string;
  socialLinks?: SocialLinkInput;
  transactionId?: string;
}

export interface PipelineOptions {
  onTransition?: (state: PipelineState) => void;
}

/**
 * Tracks where a single request is. Moves are forward only; an illegal move
 * means the orchestrator itself is broken.
 */
class PipelineRun {
  private current: PipelineState = 'ReceivedFile';

  constructor(private readonly onTransition?: (state: PipelineState) => void) {
    this.onTransition?.(this.current);
  }

  advance(next: PipelineState) {
    if (!FORWARD[this.current].includes(next)) {
      throw new Error(`Illegal pipeline transition ${this.current} -> ${next}`);
    }
    this.current = next;
    this.onTransition?.(next);
  }
}

export function resolveOutputLanguage(value: string | undefined): LanguageCode {
  const code = value === undefined || value.trim() === '' ? DEFAULT_OUTPUT_LANGUAGE : value.trim();
  if (!isLanguageCode(code)) {
    throw new UnsupportedLanguageError(code, supportedLanguageCodes());
  }
  return code;
}

/**
 * Runs one request through extraction, language detection, parsing,
 * sanitization, the five downstream stages and assembly.
 */
export class AnalysisPipeline {
  constructor(
    private readonly stages: AnalysisStages,
    private readonly options: PipelineOptions = {},
  ) {}

  async run(request: AnalysisRequest): Promise<FinalReport> {
    const transactionId = request.transactionId ?? `analyze-${uuid()}`;
    const run = new PipelineRun(this.options.onTransition);

    let outputLanguage: LanguageCode;
    let socialLinks: SocialLinks;
    let text: string;
    try {
      outputLanguage = resolveOutputLanguage(request.outputLanguage);
      socialLinks = validateSocialLinks(request.socialLinks ?? {});
      text = await extractDocumentText(request.document);
      if (text.length < MIN_TEXT_LENGTH) {
        throw new InsufficientTextError(text.length);
      }
    } catch (error) {
      if (error instanceof ValidationError) {
        run.advance('Rejected');
      }
      throw error;
    }
    run.advance('Extracted');

    const inputLanguage = detectLanguage(text);
    run.advance('LanguageDetected');

    try {
      const parsed = await this.runTolerant(this.stages.parse, text, outputLanguage, transactionId);
      run.advance('Parsed');

      if (Object.keys(socialLinks).length > 0) {
        parsed.social_links = { ...socialLinks };
      }
      const sanitized = sanitizeObject(parsed);
      run.advance('Sanitized');

      const payload = JSON.stringify(sanitized);
      run.advance('TransformsDispatched');
      const settled = await Promise.allSettled([
        this.runTolerant(this.stages.quality, payload, outputLanguage, transactionId),
        this.runTolerant(this.stages.ats, payload, outputLanguage, transactionId),
        this.runTolerant(this.stages.skills, payload, outputLanguage, transactionId),
        this.runTolerant(this.stages.career, payload, outputLanguage, transactionId),
        this.runTolerant(this.stages.rewrite, payload, outputLanguage, transactionId),
      ]);
      const [quality, ats, suggestedSkills, career, rewrite] = settled;
      if (
        quality.status === 'rejected' ||
        ats.status === 'rejected' ||
        suggestedSkills.status === 'rejected' ||
        career.status === 'rejected' ||
        rewrite.status === 'rejected'
      ) {
        const failure = settled.find((result) => result.status === 'rejected');
        throw failure?.status === 'rejected' ? failure.reason : new Error('Transform stage failed');
      }
      run.advance('TransformsCompleted');

      const report = assembleReport({
        parsed: sanitized,
        quality: quality.value,
        ats: ats.value,
        suggestedSkills: suggestedSkills.value,
        career: career.value,
        rewrite: rewrite.value,
        socialLinks,
        inputLanguage,
        outputLanguage,
      });
      run.advance('Assembled');

      await Logger.logInfo('AnalysisPipeline', 'CV analyzed and rewritten', {
        TransactionID: transactionId,
        Endpoint: 'AnalysisPipeline.run',
        Status: 'SUCCESS',
        ResponsePayload: {
          inputLanguage,
          outputLanguage,
          atsScoreBefore: report.improvements_summary.ats_score_before,
          atsScoreAfter: report.improvements_summary.ats_score_after,
        },
      });
      run.advance('Returned');
      return report;
    } catch (error) {
      if (error instanceof TransformUnavailableError) {
        run.advance('TransformFailed');
      }
      throw error;
    }
  }

  /**
   * Runs a stage and swaps malformed output for the stage's empty value.
   * Unavailability still propagates.
   */
  private async runTolerant<T>(
    stage: TransformStage<T>,
    payload: string,
    outputLanguage: LanguageCode,
    transactionId: string,
  ): Promise<T> {
    try {
      return await stage.run(payload, outputLanguage);
    } catch (error) {
      if (!(error instanceof MalformedTransformOutputError)) {
        throw error;
      }
      await Logger.logWarning('AnalysisPipeline', `Stage '${stage.name}' returned malformed output, using defaults`, {
        TransactionID: transactionId,
        Endpoint: `stage:${stage.name}`,
        Status: 'MALFORMED_OUTPUT',
        Exception: error.excerpt,
      });
      return stage.empty();
    }
  }
}
