import type { ProviderDialect } from '../types/translation';
import { geminiGenerateContentCodec } from './GeminiGenerateContentCodec';
import { openAIChatCodec } from './OpenAIChatCodec';
import type { TranslationCodec } from './TranslationCodec';

const codecs: Record<ProviderDialect, TranslationCodec> = {
  openai: openAIChatCodec,
  gemini: geminiGenerateContentCodec,
};

export function getCodec(dialect: ProviderDialect): TranslationCodec {
  return codecs[dialect];
}

export { geminiGenerateContentCodec, openAIChatCodec };
export { parseTranslation } from './TranslationCodec';
export type { CodecOptions, TranslationCodec } from './TranslationCodec';
