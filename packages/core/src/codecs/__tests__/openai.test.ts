import { describe, it, expect } from 'vitest';
import type { ChatRequest } from '../../types/messages.js';
import type { RequestTarget } from '../../types/provider.js';
import { assistantMessage, systemMessage, toolResultMessage, userMessage } from '../../message-builders.js';
import { getVendor } from '../../vendors.js';
import { createOpenAICodec } from '../openai.js';

const codec = createOpenAICodec();

function target(vendor: 'openai' | 'deepseek' | 'ollama' = 'openai', apiKey: string | null = 'test-secret'): RequestTarget {
  return { vendor: getVendor(vendor), credentials: apiKey ? { apiKey } : {} };
}

function bodyOf(request: ChatRequest, stream = false, t = target()) {
  return JSON.parse(codec.buildRequest(request, t, stream).body);
}

describe('OpenAI codec', () => {
  describe('buildRequest', () => {
    it('builds a minimal non-streaming request', () => {
      const wire = codec.buildRequest(
        { model: 'gpt-4o', messages: [userMessage('Hi')] },
        target(),
        false,
      );

      expect(wire.method).toBe('POST');
      expect(wire.url).toBe('https://api.openai.com/v1/chat/completions');
      expect(wire.headers).toEqual({ authorization: 'Bearer test-secret' });
      expect(JSON.parse(wire.body)).toEqual({
        model: 'gpt-4o',
        messages: [{ role: 'user', content: 'Hi' }],
      });
    });

    it('asks for usage in the stream', () => {
      const body = bodyOf({ model: 'gpt-4o', messages: [userMessage('Hi')] }, true);
      expect(body.stream).toBe(true);
      expect(body.stream_options).toEqual({ include_usage: true });
    });

    it('uses a base URL override and strips trailing slashes', () => {
      const wire = codec.buildRequest(
        { model: 'm', messages: [userMessage('x')] },
        { ...target(), baseUrl: 'https://gateway.example.com/v1//' },
        false,
      );
      expect(wire.url).toBe('https://gateway.example.com/v1/chat/completions');
    });

    it('omits the authorization header when no key is configured', () => {
      const wire = codec.buildRequest({ model: 'llama3', messages: [userMessage('x')] }, target('ollama', null), false);
      expect(wire.url).toBe('http://localhost:11434/v1/chat/completions');
      expect(wire.headers).toEqual({});
    });

    it('maps sampling parameters', () => {
      const body = bodyOf({
        model: 'gpt-4o',
        messages: [userMessage('x')],
        sampling: { temperature: 0.2, topP: 0.9, maxTokens: 100, stop: ['END'] },
      });
      expect(body).toMatchObject({ temperature: 0.2, top_p: 0.9, max_tokens: 100, stop: ['END'] });
    });

    it('maps penalties, seed, response format and user', () => {
      expect(bodyOf({
        model: 'gpt-4o',
        messages: [userMessage('Hi')],
        sampling: { presencePenalty: 0.5, frequencyPenalty: 0.2, seed: 42 },
        responseFormat: { type: 'json_object' },
        user: 'user-1',
        enableThinking: true,
      })).toEqual({
        model: 'gpt-4o',
        messages: [{ role: 'user', content: 'Hi' }],
        presence_penalty: 0.5,
        frequency_penalty: 0.2,
        seed: 42,
        response_format: { type: 'json_object' },
        user: 'user-1',
      });
    });

    it('converts a tool-calling conversation', () => {
      const body = bodyOf({
        model: 'gpt-4o',
        messages: [
          systemMessage('Be brief.'),
          userMessage('Weather in Paris?'),
          assistantMessage('', [{
            id: 'call_1',
            type: 'function',
            function: { name: 'get_weather', arguments: '{"city":"Paris"}' },
            index: 0,
          }]),
          toolResultMessage('call_1', '{"temp":21}'),
        ],
        tools: [{ name: 'get_weather', description: 'Current weather', parameters: { type: 'object', properties: { city: { type: 'string' } } } }],
        toolChoice: { type: 'function', name: 'get_weather' },
      });

      expect(body.messages).toEqual([
        { role: 'system', content: 'Be brief.' },
        { role: 'user', content: 'Weather in Paris?' },
        {
          role: 'assistant',
          content: null,
          tool_calls: [{ id: 'call_1', type: 'function', function: { name: 'get_weather', arguments: '{"city":"Paris"}' } }],
        },
        { role: 'tool', tool_call_id: 'call_1', content: '{"temp":21}' },
      ]);
      expect(body.tools).toEqual([{
        type: 'function',
        function: {
          name: 'get_weather',
          description: 'Current weather',
          parameters: { type: 'object', properties: { city: { type: 'string' } } },
        },
      }]);
      expect(body.tool_choice).toEqual({ type: 'function', function: { name: 'get_weather' } });
    });

    it('passes string tool choices through', () => {
      expect(bodyOf({ model: 'm', messages: [userMessage('x')], toolChoice: 'required' }).tool_choice).toBe('required');
    });

    it('sends images as content parts when the vendor accepts them', () => {
      const body = bodyOf({
        model: 'gpt-4o',
        messages: [userMessage([
          { type: 'text', text: 'What is this?' },
          { type: 'image_url', url: 'https://example.com/cat.png' },
          { type: 'image_data', mediaType: 'image/png', data: 'AAAA' },
        ])],
      });
      expect(body.messages[0].content).toEqual([
        { type: 'text', text: 'What is this?' },
        { type: 'image_url', image_url: { url: 'https://example.com/cat.png' } },
        { type: 'image_url', image_url: { url: 'data:image/png;base64,AAAA' } },
      ]);
    });

    it('replaces images with placeholders for text-only vendors', () => {
      const body = bodyOf(
        {
          model: 'deepseek-chat',
          messages: [userMessage([
            { type: 'text', text: 'Describe' },
            { type: 'image_url', url: 'https://example.com/cat.png' },
          ])],
        },
        false,
        target('deepseek'),
      );
      expect(body.messages[0].content).toBe('Describe\n[image: https://example.com/cat.png]');
    });
  });

  describe('parseResponse', () => {
    it('parses a text response', () => {
      const body = JSON.stringify({
        id: 'chatcmpl-1',
        model: 'gpt-4o-2024-08-06',
        choices: [{ index: 0, message: { role: 'assistant', content: 'hello' }, finish_reason: 'stop' }],
        usage: { prompt_tokens: 3, completion_tokens: 1, total_tokens: 4 },
      });

      expect(codec.parseResponse(body, { vendor: 'openai', model: 'gpt-4o' })).toEqual({
        id: 'chatcmpl-1',
        model: 'gpt-4o-2024-08-06',
        content: 'hello',
        toolCalls: [],
        finishReason: 'stop',
        usage: { promptTokens: 3, completionTokens: 1, totalTokens: 4 },
      });
    });

    it('parses tool calls and reasoning content', () => {
      const body = JSON.stringify({
        choices: [{
          message: {
            content: null,
            reasoning_content: 'Need the weather tool.',
            tool_calls: [{ id: 'call_1', type: 'function', function: { name: 'get_weather', arguments: '{"city":"Paris"}' } }],
          },
          finish_reason: 'tool_calls',
        }],
      });

      const response = codec.parseResponse(body, { vendor: 'deepseek', model: 'deepseek-reasoner' });
      expect(response.model).toBe('deepseek-reasoner');
      expect(response.content).toBe('');
      expect(response.reasoningContent).toBe('Need the weather tool.');
      expect(response.toolCalls).toEqual([{
        id: 'call_1',
        type: 'function',
        function: { name: 'get_weather', arguments: '{"city":"Paris"}' },
        index: 0,
      }]);
      expect(response.finishReason).toBe('tool_calls');
      expect(response.usage).toEqual({ promptTokens: 0, completionTokens: 0, totalTokens: 0 });
    });

    it('throws malformed_response for a non-JSON body', () => {
      expect(() => codec.parseResponse('<html>', { vendor: 'openai', model: 'm' }))
        .toThrow(expect.objectContaining({ kind: 'malformed_response' }));
    });

    it('throws the error envelope of a 200 response', () => {
      const body = JSON.stringify({ error: { message: 'Rate limit reached', type: 'requests', code: 'rate_limit_exceeded' } });
      expect(() => codec.parseResponse(body, { vendor: 'moonshot', model: 'm' }))
        .toThrow(expect.objectContaining({ kind: 'rate_limit', message: 'moonshot: Rate limit reached' }));
    });
  });

  describe('models', () => {
    it('lists from /models with the bearer key', () => {
      expect(codec.models?.request(target('deepseek'))).toEqual({
        url: 'https://api.deepseek.com/v1/models',
        headers: { authorization: 'Bearer test-secret' },
      });
      expect(codec.models?.request(target('ollama', null))).toEqual({ url: 'http://localhost:11434/v1/models', headers: {} });
    });

    it('keeps the ids of the data array', () => {
      const body = JSON.stringify({ object: 'list', data: [{ id: 'llama3' }, { object: 'model' }, { id: 'qwen2' }] });
      expect(codec.models?.parse(body, 'ollama')).toEqual(['llama3', 'qwen2']);
    });

    it('throws malformed_response for a non-JSON list', () => {
      expect(() => codec.models?.parse('<html>', 'openai')).toThrow(expect.objectContaining({ kind: 'malformed_response' }));
    });
  });

  describe('parseError', () => {
    it('maps status and message', () => {
      const err = codec.parseError(401, JSON.stringify({ error: { message: 'Incorrect API key provided', type: 'invalid_request_error', code: 'invalid_api_key' } }), 'openai');
      expect(err.kind).toBe('authentication');
      expect(err.status).toBe(401);
      expect(err.message).toBe('openai: Incorrect API key provided');
    });

    it('detects context length errors on 400', () => {
      const err = codec.parseError(400, JSON.stringify({ error: { message: "This model's maximum context length is 8192 tokens", code: 'context_length_exceeded' } }), 'openai');
      expect(err.kind).toBe('context_length_exceeded');
    });

    it('keeps a non-JSON body as the message', () => {
      const err = codec.parseError(502, 'Bad Gateway', 'zhipu');
      expect(err.kind).toBe('server');
      expect(err.message).toBe('zhipu: Bad Gateway');
      expect(err.retryable).toBe(true);
    });
  });
});
