import type { HttpRequest } from '../services/HttpTransport';
import type { ResolvedRequest } from '../types/translation';
import type { CodecOptions, TranslationCodec } from './TranslationCodec';
import { assertTranslatableText, isRecord, trimTrailingSlashes } from './TranslationCodec';

function buildEndpointUrl(apiBaseUrl: string, model: string): string {
  const trimmed = trimTrailingSlashes(apiBaseUrl);

  if (/:generateContent$/i.test(trimmed)) {
    return trimmed;
  }

  return `${trimmed}/models/${encodeURIComponent(model)}:generateContent`;
}

function readCandidateText(candidate: unknown): string | undefined {
  if (!isRecord(candidate) || !isRecord(candidate.content) || !Array.isArray(candidate.content.parts)) {
    return undefined;
  }

  const texts = candidate.content.parts
    .map((part: unknown) => (isRecord(part) && typeof part.text === 'string' ? part.text : undefined))
    .filter((text): text is string => text !== undefined);

  return texts.length > 0 ? texts.join('') : undefined;
}

export const geminiGenerateContentCodec: TranslationCodec = {
  dialect: 'gemini',

  buildRequest(request: ResolvedRequest, options?: CodecOptions): HttpRequest {
    assertTranslatableText(request.text, options);

    return {
      url: buildEndpointUrl(request.endpointUrl, request.model),
      headers: {
        'Content-Type': 'application/json',
        'x-goog-api-key': request.apiKey,
      },
      body: {
        contents: [{ parts: [{ text: request.prompt }, { text: request.text }] }],
      },
    };
  },

  // Blocked prompts come back without `candidates`; that counts as no choices.
  extractContents(payload: unknown): Array<string | undefined> | undefined {
    if (!isRecord(payload)) {
      return undefined;
    }

    if (payload.candidates === undefined) {
      return [];
    }

    if (!Array.isArray(payload.candidates)) {
      return undefined;
    }

    return payload.candidates.map(readCandidateText);
  },
};
