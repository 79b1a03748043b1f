import * as assert from 'assert';

import type { HttpRequest, HttpResponse, HttpTransport } from '../../src/services/HttpTransport';
import { TranslatorError } from '../../src/services/TranslatorError';
import type { LogSink } from '../../src/utils/logger';

export class MemorySink implements LogSink {
  private readonly chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  get text(): string {
    return this.chunks.join('');
  }
}

type StubReply = HttpResponse | Error;

export class StubTransport implements HttpTransport {
  readonly requests: HttpRequest[] = [];

  constructor(private readonly reply: StubReply) {}

  static json(status: number, body: unknown): StubTransport {
    return new StubTransport({ status, ok: status >= 200 && status < 300, bodyText: JSON.stringify(body) });
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);

    if (this.reply instanceof Error) {
      throw this.reply;
    }

    return this.reply;
  }
}

export function captureError(action: () => unknown): TranslatorError {
  try {
    action();
  } catch (error) {
    if (error instanceof TranslatorError) {
      return error;
    }
    throw error;
  }

  throw new assert.AssertionError({ message: 'Expected a TranslatorError to be thrown.' });
}

export async function captureAsyncError(action: () => Promise<unknown>): Promise<TranslatorError> {
  try {
    await action();
  } catch (error) {
    if (error instanceof TranslatorError) {
      return error;
    }
    throw error;
  }

  throw new assert.AssertionError({ message: 'Expected a TranslatorError to be thrown.' });
}

export function firstLine(message: string): string {
  return message.split('\n')[0] ?? '';
}
