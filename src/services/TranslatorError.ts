import { renderFriendlyMessage, renderTechnicalMessage } from '../i18n/errorMessages';
import type { TranslatorErrorContext, TranslatorErrorKind } from '../types/translation';

export class TranslatorError extends Error {
  readonly context: TranslatorErrorContext;
  readonly userFriendlyMessage: string;

  constructor(
    context: TranslatorErrorContext,
    options?: { language?: string; cause?: unknown },
  ) {
    super(
      renderTechnicalMessage(context, options),
      options?.cause === undefined ? undefined : { cause: options.cause },
    );
    this.name = 'TranslatorError';
    this.context = context;
    this.userFriendlyMessage = renderFriendlyMessage(context, options);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TranslatorError);
    }
  }

  get kind(): TranslatorErrorKind {
    return this.context.kind;
  }

  isNetworkError(): boolean {
    return this.context.kind === 'network';
  }

  isAuthError(): boolean {
    return this.context.kind === 'authentication';
  }

  isConfigError(): boolean {
    return this.context.kind === 'config';
  }
}

export function isTranslatorError(error: unknown): error is TranslatorError {
  return error instanceof TranslatorError;
}
