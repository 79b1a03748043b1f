import { DEFAULT_TRANSLATION_PROMPT } from '../constants/prompts';
import type { TranslationResult } from '../types/translation';
import { CliLogger } from '../utils/logger';
import { FetchTransport } from './HttpTransport';
import type { HttpTransport } from './HttpTransport';
import { ModelRegistry } from './ModelRegistry';
import { RequestResolver } from './RequestResolver';
import type { ResolvedEndpoint } from './RequestResolver';
import { TranslationClient } from './TranslationClient';

export interface TranslatorOptions {
  transport?: HttpTransport;
  logger?: CliLogger;
  registry?: ModelRegistry;
  language?: string;
  timeoutMs?: number;
}

/** A model and endpoint bound to one API key, for programmatic use. */
export class Translator {
  constructor(
    private readonly endpoint: ResolvedEndpoint,
    private readonly apiKey: string,
    private readonly model: string,
    private readonly client: TranslationClient,
  ) {}

  get modelName(): string {
    return this.model;
  }

  get endpointUrl(): string {
    return this.endpoint.endpointUrl;
  }

  translate(text: string, prompt: string = DEFAULT_TRANSLATION_PROMPT): Promise<TranslationResult> {
    return this.client.translate({
      ...this.endpoint,
      apiKey: this.apiKey,
      model: this.model,
      prompt,
      text,
    });
  }
}

/**
 * Throws a `modelNotFound` error when `model` is not registered and no
 * `customUrl` is given.
 */
export function createTranslator(
  apiKey: string,
  model: string,
  customUrl?: string,
  options: TranslatorOptions = {},
): Translator {
  const resolver = new RequestResolver({ env: {}, registry: options.registry, language: options.language });
  const endpoint = resolver.resolveEndpoint({ model, url: customUrl });
  const logger = options.logger ?? new CliLogger();
  const transport = options.transport ?? new FetchTransport(options.timeoutMs ?? 30000);

  return new Translator(
    endpoint,
    apiKey,
    model,
    new TranslationClient(transport, logger, { language: options.language }),
  );
}
