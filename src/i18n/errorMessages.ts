import { PROVIDER_CREDENTIAL_URLS } from '../constants/models';
import type { TranslatorErrorContext } from '../types/translation';
import { localize } from './localize';

export const MISSING_VALUE = 'missing';
export const BLANK_VALUE = 'blank';

type Options = { language?: string };

export function renderTechnicalMessage(context: TranslatorErrorContext, options?: Options): string {
  switch (context.kind) {
    case 'modelNotFound': {
      const groups = context.groups
        .map((group) => `\n\n${group.provider}: ${group.models.join(', ')}`)
        .join('');

      return [
        localize('error.modelNotFound.heading', { model: context.model }, options),
        '\n\n',
        localize('error.modelNotFound.supported', undefined, options),
        groups,
        '\n\n',
        localize('error.modelNotFound.usage', undefined, options),
      ].join('');
    }

    case 'config':
      return localize('error.config.noEnvVar', { model: context.model }, options);

    case 'authentication': {
      if (context.reason === 'rejected') {
        return localize(
          'error.auth.rejected',
          { detail: context.detail ?? '', model: context.model },
          options,
        );
      }

      const params = {
        envVar: context.envVar ?? '',
        model: context.model,
        openaiKeyUrl: PROVIDER_CREDENTIAL_URLS.OpenAI ?? '',
        googleKeyUrl: PROVIDER_CREDENTIAL_URLS['Google Gemini'] ?? '',
      };

      return context.reason === 'envUnset'
        ? localize('error.auth.envUnset', params, options)
        : localize('error.auth.envEmpty', params, options);
    }

    case 'apiCallFailed': {
      const params = { detail: context.detail, endpoint: context.endpoint, model: context.model };

      switch (context.reason) {
        case 'modelNotFound':
          return localize('error.api.modelNotFound', params, options);
        case 'endpointNotFound':
          return localize('error.api.endpointNotFound', params, options);
        case 'rateLimit':
          return localize('error.api.rateLimit', params, options);
        case 'generic': {
          const status =
            context.status === undefined
              ? ''
              : localize('error.api.statusSuffix', { status: context.status }, options);
          return localize('error.api.generic', { ...params, status }, options);
        }
      }
    }

    case 'network':
      return localize(
        context.timedOut ? 'error.network.timeout' : 'error.network.connect',
        { endpoint: context.endpoint, detail: context.detail },
        options,
      );

    case 'emptyResult':
      return localize(
        context.reason === 'noChoices' ? 'error.emptyResult.noChoices' : 'error.emptyResult.allEmpty',
        undefined,
        options,
      );

    case 'validation':
      if (context.field === 'text' && context.actual === MISSING_VALUE) {
        return localize('error.validation.textRequired', undefined, options);
      }
      if (context.field === 'text') {
        return localize('error.validation.textEmpty', undefined, options);
      }
      return localize(
        'error.validation.generic',
        { field: context.field, expected: context.expected, actual: context.actual },
        options,
      );

    case 'invalidResponse':
      return localize(
        'error.invalidResponse',
        { endpoint: context.endpoint, detail: context.detail },
        options,
      );
  }
}

function describeStatus(status: number | undefined, detail: string, options?: Options): string {
  if (status !== undefined && status >= 400 && status < 500) {
    return localize('friendly.requestError', { status }, options);
  }

  if (status !== undefined && status >= 500) {
    return localize('friendly.serverError', { status }, options);
  }

  return localize('friendly.apiFailed', { detail }, options);
}

export function renderFriendlyMessage(context: TranslatorErrorContext, options?: Options): string {
  switch (context.kind) {
    case 'modelNotFound': {
      const models = context.groups.flatMap((group) => group.models);
      const separator = options?.language?.toLowerCase().startsWith('zh') ? '、' : ', ';

      return models.length === 0
        ? localize('friendly.modelNotFound.none', { model: context.model }, options)
        : localize(
            'friendly.modelNotFound',
            { model: context.model, models: models.join(separator) },
            options,
          );
    }

    case 'apiCallFailed':
      return describeStatus(context.status, context.detail, options);

    case 'network':
      return localize(
        context.timedOut ? 'friendly.network.timeout' : 'friendly.network.connect',
        undefined,
        options,
      );

    case 'authentication':
      return localize('friendly.authentication', undefined, options);

    case 'config':
      return localize('friendly.config', { field: context.field }, options);

    case 'validation':
      return localize(
        'friendly.validation',
        { field: context.field, expected: context.expected },
        options,
      );

    case 'emptyResult':
    case 'invalidResponse':
      return localize('friendly.generic', undefined, options);
  }
}
