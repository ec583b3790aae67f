import type { ChatRequest, ToolChoice } from '../types/messages.js';
import type { ChatResponse } from '../types/response.js';
import type {
  Credentials, ProtocolCodec, RequestTarget, ResponseContext, VendorId, WireRequest,
} from '../types/provider.js';
import type { LlmError } from '../errors.js';
import { aliyunUsage, createAliyunEventMapper, mapAliyunFinishReason } from '../events/aliyun.js';
import { getRecord, getRecords, getString, type JsonRecord } from '../utils/json.js';
import { convertMessagesToOpenAI, parseOpenAIToolCalls, toOpenAITools } from './openai.js';
import {
  bearerAuth, errorEnvelope, httpError, makeUsage, parseJsonBody, resolveBaseUrl, vendorError,
} from './shared.js';

/**
 * DashScope has no "required" mode; it is sent as "auto".
 */
export function toAliyunToolChoice(choice: ToolChoice): unknown {
  if (typeof choice !== 'string') return { type: 'function', function: { name: choice.name } };
  return choice === 'required' ? 'auto' : choice;
}

function buildBody(request: ChatRequest, target: RequestTarget, stream: boolean): JsonRecord {
  const parameters: JsonRecord = { result_format: 'message' };
  // Streaming without incremental_output repeats the whole text in every chunk
  if (stream) parameters.incremental_output = true;

  const sampling = request.sampling;
  if (sampling?.maxTokens !== undefined) parameters.max_tokens = sampling.maxTokens;
  if (sampling?.temperature !== undefined) parameters.temperature = sampling.temperature;
  if (sampling?.topP !== undefined) parameters.top_p = sampling.topP;
  if (sampling?.stop && sampling.stop.length > 0) parameters.stop = sampling.stop;
  // DashScope has presence_penalty but no frequency_penalty
  if (sampling?.presencePenalty !== undefined) parameters.presence_penalty = sampling.presencePenalty;
  if (sampling?.seed !== undefined) parameters.seed = sampling.seed;
  if (request.responseFormat) parameters.response_format = { type: request.responseFormat.type };
  if (request.enableThinking !== undefined) parameters.enable_thinking = request.enableThinking;

  if (request.tools && request.tools.length > 0) {
    parameters.tools = toOpenAITools(request.tools);
  }
  if (request.toolChoice !== undefined) {
    parameters.tool_choice = toAliyunToolChoice(request.toolChoice);
  }

  return {
    model: request.model,
    input: { messages: convertMessagesToOpenAI(request.messages, target.vendor.images) },
    parameters,
  };
}

/**
 * Codec for Alibaba DashScope's native text-generation API.
 */
export function createAliyunCodec(): ProtocolCodec {
  return {
    protocol: 'aliyun',

    buildRequest(request: ChatRequest, target: RequestTarget, stream: boolean): WireRequest {
      return {
        method: 'POST',
        url: `${resolveBaseUrl(target)}/services/aigc/text-generation/generation`,
        headers: {
          ...this.authHeaders(target.credentials),
          ...this.protocolHeaders(stream),
        },
        body: JSON.stringify(buildBody(request, target, stream)),
      };
    },

    authHeaders(credentials: Credentials): Record<string, string> {
      return bearerAuth(credentials.apiKey);
    },

    protocolHeaders(stream: boolean): Record<string, string> {
      return stream ? { 'x-dashscope-sse': 'enable' } : {};
    },

    parseResponse(body: string, context: ResponseContext): ChatResponse {
      const json = parseJsonBody(body, context.vendor);

      const output = getRecord(json, 'output');
      const code = getString(json, 'code');
      if (code && !output) {
        throw vendorError(context.vendor, getString(json, 'message') ?? 'request failed', code, body);
      }

      const choice = getRecords(output, 'choices')[0];
      const message = getRecord(choice, 'message');
      const toolCalls = parseOpenAIToolCalls(message?.tool_calls);
      const usage = getRecord(json, 'usage');

      const response: ChatResponse = {
        model: context.model,
        content: getString(message, 'content') ?? '',
        toolCalls,
        finishReason: mapAliyunFinishReason(getString(choice, 'finish_reason'), toolCalls.length > 0) ?? 'stop',
        usage: usage ? aliyunUsage(usage) : makeUsage(0, 0),
      };
      const id = getString(json, 'request_id');
      if (id) response.id = id;
      const reasoning = getString(message, 'reasoning_content');
      if (reasoning) response.reasoningContent = reasoning;
      return response;
    },

    parseError(status: number, body: string, vendor: VendorId): LlmError {
      const json = errorEnvelope(body);
      return httpError(status, body, vendor, {
        message: getString(json, 'message'),
        type: getString(json, 'code'),
      });
    },

    createEventMapper(vendor: VendorId) {
      return createAliyunEventMapper(vendor);
    },
  };
}
