export interface HttpRequest {
  url: string;
  headers: Record<string, string>;
  body: unknown;
}

export interface HttpResponse {
  status: number;
  ok: boolean;
  bodyText: string;
}

export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

/** Raised when no HTTP response was received at all. */
export class TransportError extends Error {
  readonly timedOut: boolean;

  constructor(message: string, options: { timedOut: boolean; cause?: unknown }) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'TransportError';
    this.timedOut = options.timedOut;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TransportError);
    }
  }
}

function describeCause(error: Error): string {
  const cause: unknown = error.cause;

  if (cause instanceof Error && cause.message && cause.message !== error.message) {
    return `${error.message} (${cause.message})`;
  }

  return error.message || 'Network request failed.';
}

export class FetchTransport implements HttpTransport {
  constructor(private readonly timeoutMs: number) {}

  async send(request: HttpRequest): Promise<HttpResponse> {
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: 'POST',
        headers: request.headers,
        body: JSON.stringify(request.body),
        signal: controller.signal,
      });
      const bodyText = await response.text();

      return { status: response.status, ok: response.ok, bodyText };
    } catch (error) {
      if (timedOut) {
        throw new TransportError(`Request timed out after ${this.timeoutMs} ms.`, {
          timedOut: true,
          cause: error,
        });
      }

      if (error instanceof Error) {
        throw new TransportError(describeCause(error), { timedOut: false, cause: error });
      }

      throw new TransportError('Network request failed.', { timedOut: false, cause: error });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
