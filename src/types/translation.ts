export type ProviderName = 'OpenAI' | 'Google Gemini' | 'Other';

export type ProviderDialect = 'openai' | 'gemini';

export interface ModelConfig {
  readonly name: string;
  readonly url: string;
  readonly provider: ProviderName;
}

export interface ModelGroup {
  readonly provider: ProviderName;
  readonly url: string;
  readonly models: readonly string[];
}

export interface TranslationInput {
  text?: string;
  model: string;
  url?: string;
  key?: string;
  prompt: string;
}

export interface ResolvedRequest {
  endpointUrl: string;
  apiKey: string;
  model: string;
  prompt: string;
  text: string;
  provider: ProviderName;
  dialect: ProviderDialect;
}

export interface TranslationResult {
  text: string;
  model: string;
  provider: ProviderName;
  latencyMs: number;
}

export type TranslationPromptSource = 'default' | 'option' | 'file';

export interface TranslationPrompt {
  instructions: string;
  source: TranslationPromptSource;
}

export type AuthenticationFailureReason = 'envUnset' | 'envEmpty' | 'rejected';

export type ApiFailureReason = 'modelNotFound' | 'endpointNotFound' | 'rateLimit' | 'generic';

export type EmptyResultReason = 'noChoices' | 'allEmpty';

export type TranslatorErrorContext =
  | {
      kind: 'modelNotFound';
      model: string;
      groups: readonly ModelGroup[];
    }
  | {
      kind: 'config';
      field: string;
      model: string;
    }
  | {
      kind: 'authentication';
      reason: AuthenticationFailureReason;
      model: string;
      envVar?: string;
      endpoint?: string;
      status?: number;
      detail?: string;
    }
  | {
      kind: 'apiCallFailed';
      reason: ApiFailureReason;
      endpoint: string;
      model: string;
      status?: number;
      detail: string;
    }
  | {
      kind: 'network';
      endpoint: string;
      detail: string;
      timedOut: boolean;
    }
  | {
      kind: 'emptyResult';
      reason: EmptyResultReason;
    }
  | {
      kind: 'validation';
      field: string;
      expected: string;
      actual: string;
    }
  | {
      kind: 'invalidResponse';
      endpoint: string;
      detail: string;
    };

export type TranslatorErrorKind = TranslatorErrorContext['kind'];
