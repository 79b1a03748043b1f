import * as assert from 'assert';
import { suite, test } from 'mocha';

import { getCodec, geminiGenerateContentCodec, openAIChatCodec, parseTranslation } from '../../src/codecs';
import type { ResolvedRequest } from '../../src/types/translation';
import { captureError } from './helpers';

const openAIRequest: ResolvedRequest = {
  endpointUrl: 'https://api.openai.com/v1',
  apiKey: 'sk-test',
  model: 'gpt-4',
  prompt: 'Translate this.',
  text: 'hello',
  provider: 'OpenAI',
  dialect: 'openai',
};

const geminiRequest: ResolvedRequest = {
  endpointUrl: 'https://generativelanguage.googleapis.com/v1beta/',
  apiKey: 'test-google-key',
  model: 'gemini-2.5-flash',
  prompt: 'Translate this.',
  text: 'hello',
  provider: 'Google Gemini',
  dialect: 'gemini',
};

suite('OpenAI chat codec', () => {
  test('sends the prompt before the text to the chat completions endpoint', () => {
    const request = openAIChatCodec.buildRequest(openAIRequest);

    assert.strictEqual(request.url, 'https://api.openai.com/v1/chat/completions');
    assert.deepStrictEqual(request.headers, {
      'Content-Type': 'application/json',
      Authorization: 'Bearer sk-test',
    });
    assert.deepStrictEqual(request.body, {
      model: 'gpt-4',
      messages: [
        { role: 'user', content: 'Translate this.' },
        { role: 'user', content: 'hello' },
      ],
    });
  });

  test('normalizes the endpoint path', () => {
    const withSlash = openAIChatCodec.buildRequest({ ...openAIRequest, endpointUrl: 'https://x.example.com/v1//' });
    const complete = openAIChatCodec.buildRequest({
      ...openAIRequest,
      endpointUrl: 'https://x.example.com/v1/chat/completions',
    });

    assert.strictEqual(withSlash.url, 'https://x.example.com/v1/chat/completions');
    assert.strictEqual(complete.url, 'https://x.example.com/v1/chat/completions');
  });

  test('rejects blank text before building a request', () => {
    const error = captureError(() => openAIChatCodec.buildRequest({ ...openAIRequest, text: ' \n ' }));

    assert.strictEqual(error.kind, 'validation');
  });

  test('extracts one entry per choice', () => {
    const contents = openAIChatCodec.extractContents({
      choices: [
        { message: { content: 'Bonjour' } },
        { message: { content: null } },
        { message: { content: 'Salut' } },
      ],
    });

    assert.deepStrictEqual(contents, ['Bonjour', undefined, 'Salut']);
  });

  test('flags payloads without a choices array', () => {
    assert.strictEqual(openAIChatCodec.extractContents({ error: 'nope' }), undefined);
    assert.strictEqual(openAIChatCodec.extractContents('text'), undefined);
  });
});

suite('Gemini generateContent codec', () => {
  test('addresses the model and sends both texts as parts', () => {
    const request = geminiGenerateContentCodec.buildRequest(geminiRequest);

    assert.strictEqual(
      request.url,
      'https://generativelanguage.googleapis.com/v1beta/models/gemini-2.5-flash:generateContent',
    );
    assert.deepStrictEqual(request.headers, {
      'Content-Type': 'application/json',
      'x-goog-api-key': 'test-google-key',
    });
    assert.deepStrictEqual(request.body, {
      contents: [{ parts: [{ text: 'Translate this.' }, { text: 'hello' }] }],
    });
  });

  test('joins the parts of each candidate', () => {
    const contents = geminiGenerateContentCodec.extractContents({
      candidates: [
        { content: { parts: [{ text: 'Bon' }, { text: 'jour' }] } },
        { content: { parts: [] } },
        { finishReason: 'SAFETY' },
      ],
    });

    assert.deepStrictEqual(contents, ['Bonjour', undefined, undefined]);
  });

  test('treats a missing candidates field as no choices', () => {
    assert.deepStrictEqual(geminiGenerateContentCodec.extractContents({ promptFeedback: {} }), []);
    assert.strictEqual(geminiGenerateContentCodec.extractContents({ candidates: 'x' }), undefined);
  });
});

suite('parseTranslation', () => {
  test('joins non-empty choices with a newline in order', () => {
    assert.strictEqual(parseTranslation(['Bonjour', 'Salut']), 'Bonjour\nSalut');
  });

  test('skips empty choices and trims the result', () => {
    assert.strictEqual(parseTranslation([' a ', '', undefined, 'b ']), 'a \nb');
  });

  test('reports zero choices and all-empty choices differently', () => {
    const none = captureError(() => parseTranslation([]));
    const empty = captureError(() => parseTranslation(['', '  ', undefined]));

    assert.deepStrictEqual(none.context, { kind: 'emptyResult', reason: 'noChoices' });
    assert.deepStrictEqual(empty.context, { kind: 'emptyResult', reason: 'allEmpty' });
    assert.notStrictEqual(none.message, empty.message);
  });

  test('picks the codec by dialect', () => {
    assert.strictEqual(getCodec('openai'), openAIChatCodec);
    assert.strictEqual(getCodec('gemini'), geminiGenerateContentCodec);
  });
});
