import type { TranslatorErrorContext } from '../types/translation';
import { redactSecret, truncate } from '../utils/text';

export interface ProviderFailure {
  status?: number;
  message: string;
  /** Set when the request never produced an HTTP response. */
  transport?: 'network' | 'timeout';
}

export interface FailedRequest {
  endpoint: string;
  model: string;
  apiKey?: string;
}

export type FailureClass = 'authentication' | 'notFound' | 'rateLimit' | 'network' | 'generic';

interface ClassificationRule {
  failureClass: FailureClass;
  matches(failure: ProviderFailure, normalizedMessage: string): boolean;
}

const MAX_DETAIL_LENGTH = 500;

/**
 * Evaluated top to bottom, first match wins.
 *
 * A failure that never produced an HTTP status is a network failure, whatever
 * its text says: `connect ECONNREFUSED 127.0.0.1:4010` would otherwise match
 * the `401` rule. The remaining rules are substring heuristics over whatever
 * text the provider produced; an error body that does not follow the usual
 * wording can land in the wrong class.
 */
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  {
    failureClass: 'network',
    matches: (failure) => failure.transport !== undefined && failure.status === undefined,
  },
  {
    failureClass: 'authentication',
    matches: (failure, message) =>
      failure.status === 401 || message.includes('401') || message.includes('authentication'),
  },
  {
    failureClass: 'notFound',
    matches: (failure, message) =>
      failure.status === 404 || message.includes('404') || message.includes('not found'),
  },
  {
    failureClass: 'rateLimit',
    matches: (failure, message) =>
      failure.status === 429 || message.includes('429') || message.includes('rate limit'),
  },
  {
    failureClass: 'network',
    matches: (failure, message) =>
      failure.transport !== undefined ||
      message.includes('timeout') ||
      message.includes('timed out') ||
      message.includes('connection'),
  },
  {
    failureClass: 'generic',
    matches: () => true,
  },
];

export function classifyFailureClass(failure: ProviderFailure): FailureClass {
  const normalized = failure.message.toLowerCase();
  const rule = CLASSIFICATION_RULES.find((candidate) => candidate.matches(failure, normalized));
  return rule?.failureClass ?? 'generic';
}

export function classifyFailure(failure: ProviderFailure, request: FailedRequest): TranslatorErrorContext {
  const detail = truncate(redactSecret(failure.message, request.apiKey), MAX_DETAIL_LENGTH);
  const { endpoint, model } = request;
  const { status } = failure;

  switch (classifyFailureClass(failure)) {
    case 'authentication':
      return { kind: 'authentication', reason: 'rejected', model, endpoint, status, detail };

    case 'notFound': {
      const mentionsModel = failure.message.toLowerCase().includes('model');
      return {
        kind: 'apiCallFailed',
        reason: mentionsModel ? 'modelNotFound' : 'endpointNotFound',
        endpoint,
        model,
        status,
        detail,
      };
    }

    case 'rateLimit':
      return { kind: 'apiCallFailed', reason: 'rateLimit', endpoint, model, status, detail };

    case 'network':
      return {
        kind: 'network',
        endpoint,
        detail,
        timedOut: failure.transport === 'timeout' || /timeout|timed out/i.test(failure.message),
      };

    case 'generic':
      return { kind: 'apiCallFailed', reason: 'generic', endpoint, model, status, detail };
  }
}
