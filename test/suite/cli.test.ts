import * as assert from 'assert';
import { suite, test } from 'mocha';

import { runCli } from '../../src/activation/createProgram';
import type { Environment } from '../../src/utils/config';
import { MemorySink, StubTransport, firstLine } from './helpers';

interface CliRun {
  code: number;
  stdout: string;
  stderr: string;
  transport: StubTransport;
}

async function run(
  args: string[],
  env: Environment = {},
  transport = new StubTransport(new Error('unused')),
): Promise<CliRun> {
  const stdout = new MemorySink();
  const stderr = new MemorySink();
  const code = await runCli(['node', 'transome', ...args], { env, stdout, stderr, transport });

  return { code, stdout: stdout.text, stderr: stderr.text, transport };
}

suite('CLI', () => {
  test('lists the supported models grouped by provider', async () => {
    const result = await run(['--list-models']);

    assert.strictEqual(result.code, 0);
    assert.ok(
      result.stdout.startsWith(
        '\nSupported models:\n\nGoogle Gemini (https://generativelanguage.googleapis.com/v1beta/openai):\n  - gemini-1.5-flash\n',
      ),
    );
    assert.ok(result.stdout.includes('\nOpenAI (https://api.openai.com/v1):\n'));
    assert.strictEqual(result.transport.requests.length, 0);
  });

  test('prints the translation to stdout', async () => {
    const transport = StubTransport.json(200, { choices: [{ message: { content: 'Bonjour' } }] });

    const result = await run(['-m', 'gpt-4o', 'Hello'], { OPENAI_API_KEY: 'test-secret' }, transport);

    assert.strictEqual(result.code, 0);
    assert.strictEqual(result.stdout, 'Bonjour\n');
    assert.strictEqual(result.stderr, '');
    assert.strictEqual(transport.requests[0]?.url, 'https://api.openai.com/v1/chat/completions');
    assert.strictEqual(transport.requests[0]?.headers.Authorization, 'Bearer test-secret');
  });

  test('talks to a native Gemini endpoint given with --url', async () => {
    const transport = StubTransport.json(200, { candidates: [{ content: { parts: [{ text: 'Salut' }] } }] });

    const result = await run(
      ['-u', 'https://generativelanguage.googleapis.com/v1beta', '-m', 'gemini-exp', '-k', 'test-secret', 'Hi'],
      {},
      transport,
    );

    assert.strictEqual(result.code, 0);
    assert.strictEqual(result.stdout, 'Salut\n');
    assert.strictEqual(
      transport.requests[0]?.url,
      'https://generativelanguage.googleapis.com/v1beta/models/gemini-exp:generateContent',
    );
    assert.strictEqual(transport.requests[0]?.headers['x-goog-api-key'], 'test-secret');
  });

  test('reports an unknown model without sending a request', async () => {
    const result = await run(['-m', 'unknown-model', '-k', 'test-secret', 'Hello']);

    assert.strictEqual(result.code, 1);
    assert.strictEqual(firstLine(result.stderr), "Error: Model 'unknown-model' not found");
    assert.ok(result.stderr.includes('\n\nGoogle Gemini: gemini-1.5-flash, '));
    assert.ok(result.stderr.includes('\n\nOpenAI: gpt-3.5-turbo, '));
    assert.strictEqual(result.transport.requests.length, 0);
  });

  test('rejects more than one text argument', async () => {
    const result = await run(['-k', 'test-secret', '-m', 'gpt-4', 'hello', 'world']);

    assert.strictEqual(result.code, 1);
    assert.ok(result.stderr.startsWith('error: too many arguments'));
    assert.strictEqual(result.stdout, '');
    assert.strictEqual(result.transport.requests.length, 0);
  });

  test('sends a Gemini OpenAI-compatible chat completions URL unchanged', async () => {
    const transport = StubTransport.json(200, { choices: [{ message: { content: 'Hallo' } }] });
    const url = 'https://generativelanguage.googleapis.com/v1beta/openai/chat/completions';

    const result = await run(['-u', url, '-m', 'gemini-2.5-flash', '-k', 'test-secret', 'Hello'], {}, transport);

    assert.strictEqual(result.code, 0);
    assert.strictEqual(result.stdout, 'Hallo\n');
    assert.strictEqual(transport.requests[0]?.url, url);
    assert.strictEqual(transport.requests[0]?.headers.Authorization, 'Bearer test-secret');
  });

  test('rejects blank text', async () => {
    const result = await run(['   ', '-k', 'test-secret']);

    assert.strictEqual(result.code, 1);
    assert.strictEqual(firstLine(result.stderr), 'Error: Text to translate cannot be empty.');
    assert.ok(result.stderr.endsWith("\n\nHint: Invalid argument: 'text' should be non-empty text\n"));
  });

  test('explains a missing environment variable', async () => {
    const result = await run(['-m', 'gpt-4o', 'Hello']);

    assert.strictEqual(result.code, 1);
    assert.strictEqual(firstLine(result.stderr), 'Error: Environment variable OPENAI_API_KEY is not set.');
  });

  test('reports provider failures with a hint', async () => {
    const transport = new StubTransport({ status: 503, ok: false, bodyText: 'upstream unavailable' });

    const result = await run(['-m', 'gpt-4o', '-k', 'test-secret', 'Hello'], {}, transport);

    assert.strictEqual(result.code, 1);
    assert.strictEqual(result.stdout, '');
    assert.ok(result.stderr.endsWith('\n\nHint: Server error (503): please try again later\n'));
  });

  test('localizes errors from the locale', async () => {
    const result = await run([], { LANG: 'zh_CN.UTF-8' });

    assert.strictEqual(result.code, 1);
    assert.strictEqual(firstLine(result.stderr), '错误：要翻译的文本是必需的');
  });

  test('prints the version', async () => {
    const result = await run(['--version']);

    assert.strictEqual(result.code, 0);
    assert.strictEqual(result.stdout, '0.2.0\n');
  });
});
