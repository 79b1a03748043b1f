import * as assert from 'assert';
import { suite, test } from 'mocha';

import { TranslatorError, isTranslatorError } from '../../src/services/TranslatorError';
import { firstLine } from './helpers';

const endpoint = 'https://api.example.com/v1';

suite('TranslatorError', () => {
  test('renders API failures with the status code', () => {
    const error = new TranslatorError({
      kind: 'apiCallFailed',
      reason: 'generic',
      endpoint,
      model: 'gpt-4',
      status: 500,
      detail: 'boom',
    });

    assert.strictEqual(firstLine(error.message), 'API call to https://api.example.com/v1 failed with status 500: boom');
    assert.ok(error.message.includes('transome --list-models'));
    assert.strictEqual(error.userFriendlyMessage, 'Server error (500): please try again later');
  });

  test('paraphrases client errors and status-less failures', () => {
    const notFound = new TranslatorError({
      kind: 'apiCallFailed',
      reason: 'endpointNotFound',
      endpoint,
      model: 'gpt-4',
      status: 404,
      detail: 'HTTP 404: Not Found',
    });
    const unknown = new TranslatorError({
      kind: 'apiCallFailed',
      reason: 'generic',
      endpoint,
      model: 'gpt-4',
      detail: 'boom',
    });

    assert.strictEqual(firstLine(notFound.message), 'Endpoint not found: HTTP 404: Not Found');
    assert.strictEqual(notFound.userFriendlyMessage, 'Request error (404): check the parameters or permissions');
    assert.strictEqual(firstLine(unknown.message), 'API call to https://api.example.com/v1 failed: boom');
    assert.strictEqual(unknown.userFriendlyMessage, 'API call failed: boom');
  });

  test('distinguishes connection failures from timeouts', () => {
    const connect = new TranslatorError({ kind: 'network', endpoint, detail: 'ECONNREFUSED', timedOut: false });
    const timeout = new TranslatorError({ kind: 'network', endpoint, detail: 'slow', timedOut: true });

    assert.strictEqual(connect.userFriendlyMessage, 'Network connection failed, check your network settings');
    assert.strictEqual(timeout.userFriendlyMessage, 'Request timed out, please try again later');
    assert.ok(timeout.message.includes('export TRANSOME_TIMEOUT_MS=<milliseconds>'));
    assert.ok(connect.isNetworkError());
  });

  test('lists available models in the friendly model-not-found message', () => {
    const groups = [{ provider: 'OpenAI' as const, url: 'https://api.openai.com/v1', models: ['gpt-4', 'gpt-4o'] }];
    const english = new TranslatorError({ kind: 'modelNotFound', model: 'gpt-5', groups });
    const chinese = new TranslatorError({ kind: 'modelNotFound', model: 'gpt-5', groups }, { language: 'zh-CN' });
    const empty = new TranslatorError({ kind: 'modelNotFound', model: 'gpt-5', groups: [] });

    assert.strictEqual(english.userFriendlyMessage, "Model 'gpt-5' not found; available models: gpt-4, gpt-4o");
    assert.strictEqual(chinese.userFriendlyMessage, "找不到模型 'gpt-5'，可用的模型有：gpt-4、gpt-4o");
    assert.strictEqual(empty.userFriendlyMessage, "Model 'gpt-5' not found; no models are available");
  });

  test('describes validation and configuration problems by field', () => {
    const validation = new TranslatorError({
      kind: 'validation',
      field: 'prompt-file',
      expected: 'a readable file',
      actual: '/tmp/missing.md',
    });
    const config = new TranslatorError({ kind: 'config', field: 'apiKey', model: 'custom-model' });

    assert.strictEqual(
      firstLine(validation.message),
      "Invalid value for 'prompt-file': expected a readable file, got /tmp/missing.md.",
    );
    assert.strictEqual(validation.userFriendlyMessage, "Invalid argument: 'prompt-file' should be a readable file");
    assert.strictEqual(config.userFriendlyMessage, "Configuration error: check the 'apiKey' setting");
    assert.ok(config.isConfigError());
    assert.ok(!config.isAuthError());
  });

  test('keeps the cause and is recognizable', () => {
    const cause = new Error('root');
    const error = new TranslatorError({ kind: 'emptyResult', reason: 'allEmpty' }, { cause });

    assert.strictEqual(error.cause, cause);
    assert.strictEqual(error.name, 'TranslatorError');
    assert.strictEqual(error.userFriendlyMessage, 'Operation failed, please try again');
    assert.ok(isTranslatorError(error));
    assert.ok(!isTranslatorError(cause));
  });
});
