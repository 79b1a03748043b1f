import { getModelRegistry } from './services/ModelRegistry';
import type { ProviderName } from './types/translation';

export { APP_DESCRIPTION, APP_NAME, APP_VERSION } from './constants/app';
export { DEFAULT_MODEL } from './constants/models';
export { DEFAULT_TRANSLATION_PROMPT } from './constants/prompts';
export { getCodec, geminiGenerateContentCodec, openAIChatCodec, parseTranslation } from './codecs';
export type { TranslationCodec } from './codecs';
export { classifyFailure, classifyFailureClass } from './services/ErrorClassifier';
export type { FailureClass, ProviderFailure } from './services/ErrorClassifier';
export { FetchTransport, TransportError } from './services/HttpTransport';
export type { HttpRequest, HttpResponse, HttpTransport } from './services/HttpTransport';
export { ModelRegistry, getModelRegistry } from './services/ModelRegistry';
export { PromptResolver } from './services/PromptResolver';
export { RequestResolver, selectDialect } from './services/RequestResolver';
export { TranslationClient } from './services/TranslationClient';
export { Translator, createTranslator } from './services/Translator';
export { TranslatorError, isTranslatorError } from './services/TranslatorError';
export { getCliConfiguration } from './utils/config';
export { CliLogger } from './utils/logger';
export type {
  ModelConfig,
  ModelGroup,
  ProviderDialect,
  ProviderName,
  ResolvedRequest,
  TranslationInput,
  TranslationPrompt,
  TranslationResult,
  TranslatorErrorContext,
  TranslatorErrorKind,
} from './types/translation';
export type { CliConfiguration, LogLevel } from './types/config';

export function getSupportedModels(): string[] {
  return getModelRegistry().supportedModelNames();
}

export function isModelSupported(model: string): boolean {
  return getModelRegistry().isModelSupported(model);
}

export function getModelProvider(model: string): ProviderName | 'Unknown' {
  return getModelRegistry().modelProvider(model);
}
