import { BLANK_VALUE, MISSING_VALUE } from '../i18n/errorMessages';
import type {
  ProviderDialect,
  ProviderName,
  ResolvedRequest,
  TranslationInput,
  TranslatorErrorContext,
} from '../types/translation';
import type { Environment } from '../utils/config';
import { isBlank } from '../utils/text';
import { ModelRegistry, getModelRegistry } from './ModelRegistry';
import { TranslatorError } from './TranslatorError';

export interface RequestResolverOptions {
  env: Environment;
  registry?: ModelRegistry;
  language?: string;
}

export interface ResolvedEndpoint {
  endpointUrl: string;
  provider: ProviderName;
  dialect: ProviderDialect;
}

const OPENAI_COMPATIBLE_SUFFIX = /\/openai(\/chat\/completions)?\/?$/i;

/**
 * Turns raw CLI input into a request the codecs can send.
 *
 * Checks run in a fixed order (text, then credentials, then model) and the
 * first failure is thrown.
 */
export class RequestResolver {
  private readonly registry: ModelRegistry;

  constructor(private readonly options: RequestResolverOptions) {
    this.registry = options.registry ?? getModelRegistry();
  }

  validate(input: Omit<TranslationInput, 'prompt'>): void {
    this.requireText(input.text);
    this.resolveApiKey(input);

    if (input.url === undefined) {
      this.requireSupportedModel(input.model);
    }
  }

  resolve(input: TranslationInput): ResolvedRequest {
    const text = this.requireText(input.text);
    const apiKey = this.resolveApiKey(input);
    const endpoint = this.resolveEndpoint(input);

    return {
      ...endpoint,
      apiKey,
      model: input.model,
      prompt: input.prompt,
      text,
    };
  }

  resolveApiKey(input: Pick<TranslationInput, 'key' | 'model'>): string {
    if (input.key !== undefined) {
      return input.key;
    }

    const envVar = this.registry.envVarForModel(input.model);

    if (!envVar) {
      throw this.fail({ kind: 'config', field: 'apiKey', model: input.model });
    }

    const value = this.options.env[envVar];

    if (value === undefined) {
      throw this.fail({ kind: 'authentication', reason: 'envUnset', envVar, model: input.model });
    }

    if (isBlank(value)) {
      throw this.fail({ kind: 'authentication', reason: 'envEmpty', envVar, model: input.model });
    }

    return value;
  }

  resolveEndpoint(input: Pick<TranslationInput, 'url' | 'model'>): ResolvedEndpoint {
    const endpointUrl = input.url ?? this.requireSupportedModel(input.model);
    const provider = this.registry.lookupProvider(endpointUrl);

    return { endpointUrl, provider, dialect: selectDialect(provider, endpointUrl) };
  }

  private requireText(text: string | undefined): string {
    if (text === undefined) {
      throw this.fail({ kind: 'validation', field: 'text', expected: 'non-empty text', actual: MISSING_VALUE });
    }

    if (isBlank(text)) {
      throw this.fail({ kind: 'validation', field: 'text', expected: 'non-empty text', actual: BLANK_VALUE });
    }

    return text;
  }

  private requireSupportedModel(model: string): string {
    const url = this.registry.lookupUrl(model);

    if (url === undefined) {
      throw this.fail({ kind: 'modelNotFound', model, groups: this.registry.groupedByProvider() });
    }

    return url;
  }

  private fail(context: TranslatorErrorContext): TranslatorError {
    return new TranslatorError(context, { language: this.options.language });
  }
}

/**
 * Gemini hosts speak the native generateContent API unless the URL points at
 * their OpenAI-compatible surface, either its base or its chat completions
 * route.
 */
export function selectDialect(provider: ProviderName, endpointUrl: string): ProviderDialect {
  if (provider !== 'Google Gemini') {
    return 'openai';
  }

  let pathname: string;
  try {
    pathname = new URL(endpointUrl).pathname;
  } catch {
    pathname = endpointUrl;
  }

  return OPENAI_COMPATIBLE_SUFFIX.test(pathname) ? 'openai' : 'gemini';
}
