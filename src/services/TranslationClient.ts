import { getCodec, parseTranslation } from '../codecs';
import type { ResolvedRequest, TranslationResult } from '../types/translation';
import { CliLogger } from '../utils/logger';
import { redactSecret, truncate } from '../utils/text';
import { classifyFailure } from './ErrorClassifier';
import type { HttpResponse, HttpTransport } from './HttpTransport';
import { TransportError } from './HttpTransport';
import { TranslatorError } from './TranslatorError';

export interface TranslationClientOptions {
  language?: string;
}

const MAX_BODY_PREVIEW = 300;

/**
 * Sends exactly one request per call. There is no retry: every failure is
 * classified once and thrown.
 */
export class TranslationClient {
  constructor(
    private readonly transport: HttpTransport,
    private readonly logger: CliLogger,
    private readonly options: TranslationClientOptions = {},
  ) {}

  async translate(request: ResolvedRequest): Promise<TranslationResult> {
    const codec = getCodec(request.dialect);
    const language = this.options.language;
    const httpRequest = codec.buildRequest(request, { language });

    this.logger.event('translation.request', {
      url: httpRequest.url,
      model: request.model,
      provider: request.provider,
      dialect: codec.dialect,
      characters: request.text.length,
    });

    const started = Date.now();
    const response = await this.send(request, () => this.transport.send(httpRequest));
    const latencyMs = Date.now() - started;

    this.logger.event('translation.response', { status: response.status, latencyMs });

    if (!response.ok) {
      const body = truncate(redactSecret(response.bodyText.trim(), request.apiKey), MAX_BODY_PREVIEW);
      throw this.fail(
        classifyFailure(
          { status: response.status, message: `HTTP ${response.status}: ${body || 'No body'}` },
          { endpoint: request.endpointUrl, model: request.model, apiKey: request.apiKey },
        ),
      );
    }

    const payload = this.parseJson(response, request);
    const contents = codec.extractContents(payload);

    if (contents === undefined) {
      throw this.fail({
        kind: 'invalidResponse',
        endpoint: request.endpointUrl,
        detail: `response does not match the ${codec.dialect} format`,
      });
    }

    const text = parseTranslation(contents, { language });
    this.logger.info(`Received ${contents.length} choice(s) from ${request.model} in ${latencyMs} ms.`);

    return { text, model: request.model, provider: request.provider, latencyMs };
  }

  private async send(
    request: ResolvedRequest,
    perform: () => Promise<HttpResponse>,
  ): Promise<HttpResponse> {
    try {
      return await perform();
    } catch (error) {
      if (error instanceof TransportError) {
        throw this.fail(
          classifyFailure(
            { message: error.message, transport: error.timedOut ? 'timeout' : 'network' },
            { endpoint: request.endpointUrl, model: request.model, apiKey: request.apiKey },
          ),
          error,
        );
      }

      const message = error instanceof Error ? error.message : String(error);
      throw this.fail(
        classifyFailure(
          { message },
          { endpoint: request.endpointUrl, model: request.model, apiKey: request.apiKey },
        ),
        error,
      );
    }
  }

  private parseJson(response: HttpResponse, request: ResolvedRequest): unknown {
    try {
      return JSON.parse(response.bodyText);
    } catch (error) {
      const preview = truncate(redactSecret(response.bodyText.trim(), request.apiKey), MAX_BODY_PREVIEW);
      throw this.fail(
        {
          kind: 'invalidResponse',
          endpoint: request.endpointUrl,
          detail: `invalid JSON body: ${preview || 'empty body'}`,
        },
        error,
      );
    }
  }

  private fail(context: TranslatorError['context'], cause?: unknown): TranslatorError {
    return new TranslatorError(context, { language: this.options.language, cause });
  }
}
