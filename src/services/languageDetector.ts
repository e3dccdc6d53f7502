import { franc } from 'franc';
import type { LanguageCode } from '../types/analysis';
import { Logger } from '../utils/Logger';

export const DEFAULT_LANGUAGE: LanguageCode = 'en';

export const SUPPORTED_LANGUAGES: Readonly<Record<LanguageCode, string>> = Object.freeze({
  en: 'English',
  de: 'German (Deutsch)',
  ar: 'Arabic (العربية)',
});

const SHORT_NAMES: Readonly<Record<LanguageCode, string>> = Object.freeze({
  en: 'English',
  de: 'German',
  ar: 'Arabic',
});

// franc answers in ISO 639-3
const FROM_ISO_639_3: Readonly<Record<string, LanguageCode>> = Object.freeze({
  eng: 'en',
  deu: 'de',
  arb: 'ar',
});

export function isLanguageCode(value: unknown): value is LanguageCode {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(SUPPORTED_LANGUAGES, value);
}

export function supportedLanguageCodes(): LanguageCode[] {
  return Object.keys(SUPPORTED_LANGUAGES).filter(isLanguageCode);
}

/** Full display name used inside instructions, e.g. "German (Deutsch)". */
export function getLanguageName(code: LanguageCode): string {
  return SUPPORTED_LANGUAGES[code];
}

export function getLanguageShortName(code: LanguageCode): string {
  return SHORT_NAMES[code];
}

export function fromIso6393(code: string): LanguageCode {
  return FROM_ISO_639_3[code] ?? DEFAULT_LANGUAGE;
}

/**
 * Best-effort language of a CV. Short or ambiguous text and languages we do
 * not support all come back as English; this never throws.
 */
export function detectLanguage(text: string): LanguageCode {
  try {
    return fromIso6393(franc(text, { minLength: 10 }));
  } catch (error) {
    void Logger.logWarning('LanguageDetector', 'Language detection failed, falling back to English', {
      Endpoint: 'detectLanguage',
      Exception: error instanceof Error ? error.message : String(error),
    });
    return DEFAULT_LANGUAGE;
  }
}
