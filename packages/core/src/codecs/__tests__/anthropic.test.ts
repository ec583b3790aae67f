import { describe, it, expect } from 'vitest';
import type { RequestTarget } from '../../types/provider.js';
import { assistantMessage, systemMessage, toolResultMessage, userMessage } from '../../message-builders.js';
import { getVendor } from '../../vendors.js';
import { createAnthropicCodec, DEFAULT_MAX_TOKENS } from '../anthropic.js';

const codec = createAnthropicCodec();
const target: RequestTarget = { vendor: getVendor('anthropic'), credentials: { apiKey: 'test-secret' } };

const weatherCall = {
  id: 'toolu_1',
  type: 'function' as const,
  function: { name: 'get_weather', arguments: '{"city":"Paris"}' },
  index: 0,
};

describe('Anthropic codec', () => {
  describe('buildRequest', () => {
    it('sets the messages endpoint and headers', () => {
      const wire = codec.buildRequest({ model: 'claude-3-5-haiku-latest', messages: [userMessage('Hi')] }, target, true);
      expect(wire.url).toBe('https://api.anthropic.com/v1/messages');
      expect(wire.headers).toEqual({ 'x-api-key': 'test-secret', 'anthropic-version': '2023-06-01' });
      expect(JSON.parse(wire.body)).toEqual({
        model: 'claude-3-5-haiku-latest',
        max_tokens: DEFAULT_MAX_TOKENS,
        messages: [{ role: 'user', content: [{ type: 'text', text: 'Hi' }] }],
        stream: true,
      });
    });

    it('lifts system messages and maps sampling', () => {
      const body = JSON.parse(codec.buildRequest({
        model: 'claude',
        messages: [systemMessage('Rule one.'), systemMessage('Rule two.'), userMessage('Go')],
        sampling: { maxTokens: 50, temperature: 0, topP: 0.5, stop: ['###'] },
      }, target, false).body);

      expect(body.system).toBe('Rule one.\n\nRule two.');
      expect(body).toMatchObject({ max_tokens: 50, temperature: 0, top_p: 0.5, stop_sequences: ['###'] });
      expect(body.stream).toBeUndefined();
    });

    it('sends the user as metadata and drops fields the Messages API lacks', () => {
      const body = JSON.parse(codec.buildRequest({
        model: 'claude',
        messages: [userMessage('Go')],
        sampling: { presencePenalty: 1, frequencyPenalty: 1, seed: 3 },
        responseFormat: { type: 'json_object' },
        user: 'user-1',
      }, target, false).body);

      expect(body).toEqual({
        model: 'claude',
        max_tokens: DEFAULT_MAX_TOKENS,
        messages: [{ role: 'user', content: [{ type: 'text', text: 'Go' }] }],
        metadata: { user_id: 'user-1' },
      });
    });

    it('converts tool calls and results, merging adjacent user turns', () => {
      const body = JSON.parse(codec.buildRequest({
        model: 'claude',
        messages: [
          userMessage('Weather?'),
          assistantMessage('Let me check.', [weatherCall]),
          toolResultMessage('toolu_1', 'Sunny'),
          userMessage('Thanks'),
        ],
      }, target, false).body);

      expect(body.messages).toEqual([
        { role: 'user', content: [{ type: 'text', text: 'Weather?' }] },
        {
          role: 'assistant',
          content: [
            { type: 'text', text: 'Let me check.' },
            { type: 'tool_use', id: 'toolu_1', name: 'get_weather', input: { city: 'Paris' } },
          ],
        },
        {
          role: 'user',
          content: [
            { type: 'tool_result', tool_use_id: 'toolu_1', content: 'Sunny' },
            { type: 'text', text: 'Thanks' },
          ],
        },
      ]);
    });

    it('drops the empty text block of a tool-only assistant turn', () => {
      const body = JSON.parse(codec.buildRequest({
        model: 'claude',
        messages: [userMessage('Weather?'), assistantMessage('', [weatherCall])],
      }, target, false).body);
      expect(body.messages[1].content).toEqual([
        { type: 'tool_use', id: 'toolu_1', name: 'get_weather', input: { city: 'Paris' } },
      ]);
    });

    it('rejects tool-call arguments that are not a JSON object', () => {
      const bad = { ...weatherCall, function: { name: 'get_weather', arguments: '{"city":' } };
      expect(() => codec.buildRequest({ model: 'claude', messages: [assistantMessage('', [bad])] }, target, false))
        .toThrow(expect.objectContaining({ kind: 'invalid_request' }));
    });

    it('maps tools and tool choice', () => {
      const body = JSON.parse(codec.buildRequest({
        model: 'claude',
        messages: [userMessage('x')],
        tools: [{ name: 'get_weather', parameters: { type: 'object', properties: {} } }],
        toolChoice: 'required',
      }, target, false).body);
      expect(body.tools).toEqual([{ name: 'get_weather', input_schema: { type: 'object', properties: {} } }]);
      expect(body.tool_choice).toEqual({ type: 'any' });
    });

    it('sends images as url and base64 sources', () => {
      const body = JSON.parse(codec.buildRequest({
        model: 'claude',
        messages: [userMessage([
          { type: 'image_url', url: 'https://example.com/a.jpg' },
          { type: 'image_data', mediaType: 'image/jpeg', data: 'BBBB' },
        ])],
      }, target, false).body);
      expect(body.messages[0].content).toEqual([
        { type: 'image', source: { type: 'url', url: 'https://example.com/a.jpg' } },
        { type: 'image', source: { type: 'base64', media_type: 'image/jpeg', data: 'BBBB' } },
      ]);
    });
  });

  describe('parseResponse', () => {
    it('parses text, thinking and tool use blocks', () => {
      const body = JSON.stringify({
        id: 'msg_1',
        type: 'message',
        model: 'claude-3-5-sonnet-20241022',
        content: [
          { type: 'thinking', thinking: 'Weather needs a tool.' },
          { type: 'text', text: 'Checking.' },
          { type: 'tool_use', id: 'toolu_1', name: 'get_weather', input: { city: 'Paris' } },
        ],
        stop_reason: 'tool_use',
        usage: { input_tokens: 12, output_tokens: 30 },
      });

      expect(codec.parseResponse(body, { vendor: 'anthropic', model: 'claude' })).toEqual({
        id: 'msg_1',
        model: 'claude-3-5-sonnet-20241022',
        content: 'Checking.',
        reasoningContent: 'Weather needs a tool.',
        toolCalls: [{
          id: 'toolu_1',
          type: 'function',
          function: { name: 'get_weather', arguments: '{"city":"Paris"}' },
          index: 0,
        }],
        finishReason: 'tool_calls',
        usage: { promptTokens: 12, completionTokens: 30, totalTokens: 42 },
      });
    });

    it('skips tool_use blocks without a name', () => {
      const body = JSON.stringify({
        content: [
          { type: 'tool_use', id: 'toolu_x', input: {} },
          { type: 'tool_use', id: 'toolu_2', name: 'lookup', input: {} },
        ],
        stop_reason: 'tool_use',
      });
      expect(codec.parseResponse(body, { vendor: 'anthropic', model: 'claude' }).toolCalls).toEqual([
        { id: 'toolu_2', type: 'function', function: { name: 'lookup', arguments: '{}' }, index: 0 },
      ]);
    });

    it('maps max_tokens to length', () => {
      const body = JSON.stringify({ content: [{ type: 'text', text: 'cut' }], stop_reason: 'max_tokens' });
      expect(codec.parseResponse(body, { vendor: 'anthropic', model: 'claude' }).finishReason).toBe('length');
    });
  });

  describe('models', () => {
    it('lists from /v1/models with the key and API version', () => {
      expect(codec.models?.request(target)).toEqual({
        url: 'https://api.anthropic.com/v1/models',
        headers: { 'x-api-key': 'test-secret', 'anthropic-version': '2023-06-01' },
      });
      expect(codec.models?.parse(JSON.stringify({ data: [{ id: 'claude-a', type: 'model' }], has_more: false }), 'anthropic'))
        .toEqual(['claude-a']);
    });
  });

  describe('parseError', () => {
    it('reads the error envelope', () => {
      const err = codec.parseError(529, JSON.stringify({ type: 'error', error: { type: 'overloaded_error', message: 'Overloaded' } }), 'anthropic');
      expect(err.kind).toBe('server');
      expect(err.message).toBe('anthropic: Overloaded');
      expect(err.status).toBe(529);
    });

    it('refines an unmapped status with the vendor error type', () => {
      const err = codec.parseError(418, JSON.stringify({ type: 'error', error: { type: 'rate_limit_error', message: 'Slow down' } }), 'anthropic');
      expect(err.kind).toBe('rate_limit');
    });
  });
});
