import type { HttpRequest } from '../services/HttpTransport';
import type { ResolvedRequest } from '../types/translation';
import type { CodecOptions, TranslationCodec } from './TranslationCodec';
import { assertTranslatableText, isRecord, trimTrailingSlashes } from './TranslationCodec';

export interface ChatMessage {
  role: 'user';
  content: string;
}

function buildEndpointUrl(apiBaseUrl: string): string {
  const trimmed = trimTrailingSlashes(apiBaseUrl);

  if (/\/chat\/completions$/i.test(trimmed)) {
    return trimmed;
  }

  return `${trimmed}/chat/completions`;
}

function readMessageContent(choice: unknown): string | undefined {
  if (!isRecord(choice) || !isRecord(choice.message)) {
    return undefined;
  }

  const { content } = choice.message;
  return typeof content === 'string' ? content : undefined;
}

export const openAIChatCodec: TranslationCodec = {
  dialect: 'openai',

  buildRequest(request: ResolvedRequest, options?: CodecOptions): HttpRequest {
    assertTranslatableText(request.text, options);

    // The instructions go first; both are sent as user turns.
    const messages: ChatMessage[] = [
      { role: 'user', content: request.prompt },
      { role: 'user', content: request.text },
    ];

    return {
      url: buildEndpointUrl(request.endpointUrl),
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${request.apiKey}`,
      },
      body: { model: request.model, messages },
    };
  },

  extractContents(payload: unknown): Array<string | undefined> | undefined {
    if (!isRecord(payload) || !Array.isArray(payload.choices)) {
      return undefined;
    }

    return payload.choices.map(readMessageContent);
  },
};
