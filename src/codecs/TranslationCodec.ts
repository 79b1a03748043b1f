import { BLANK_VALUE } from '../i18n/errorMessages';
import type { HttpRequest } from '../services/HttpTransport';
import { TranslatorError } from '../services/TranslatorError';
import type { ProviderDialect, ResolvedRequest } from '../types/translation';
import { isBlank } from '../utils/text';

export interface CodecOptions {
  language?: string;
}

/**
 * One provider wire format: how a request is laid out and where the
 * generated text sits in the response.
 */
export interface TranslationCodec {
  readonly dialect: ProviderDialect;
  buildRequest(request: ResolvedRequest, options?: CodecOptions): HttpRequest;
  /** Returns one entry per choice, or `undefined` when the payload has the wrong shape. */
  extractContents(payload: unknown): Array<string | undefined> | undefined;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function assertTranslatableText(text: string, options?: CodecOptions): void {
  if (isBlank(text)) {
    throw new TranslatorError(
      { kind: 'validation', field: 'text', expected: 'non-empty text', actual: BLANK_VALUE },
      options,
    );
  }
}

export function trimTrailingSlashes(url: string): string {
  return url.replace(/\/+$/, '');
}

export function parseTranslation(contents: ReadonlyArray<string | undefined>, options?: CodecOptions): string {
  if (contents.length === 0) {
    throw new TranslatorError({ kind: 'emptyResult', reason: 'noChoices' }, options);
  }

  const text = contents
    .filter((content): content is string => content !== undefined && !isBlank(content))
    .join('\n')
    .trim();

  if (!text) {
    throw new TranslatorError({ kind: 'emptyResult', reason: 'allEmpty' }, options);
  }

  return text;
}
