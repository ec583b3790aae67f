import type { ChatRequest, Message, ToolCall, ToolChoice, ToolDefinition } from '../types/messages.js';
import type { ChatResponse } from '../types/response.js';
import type {
  Credentials, ImageSupport, ModelsRequest, ProtocolCodec, RequestTarget, ResponseContext, VendorId, WireRequest,
} from '../types/provider.js';
import type { LlmError } from '../errors.js';
import { createOpenAIEventMapper, mapOpenAIFinishReason } from '../events/openai.js';
import { getNumber, getRecord, getRecords, getString, isRecord } from '../utils/json.js';
import {
  argumentsText, bearerAuth, canSendImage, dataUrl, errorEnvelope, flattenContent, hasImages, httpError,
  imagePlaceholder, makeUsage, parseJsonBody, parseModelList, resolveBaseUrl, vendorError,
} from './shared.js';

type WireMessage = Record<string, unknown>;

function convertUserContent(message: Message, images: ImageSupport): string | Array<Record<string, unknown>> {
  if (images === 'none' || !hasImages(message)) {
    return flattenContent(message.content);
  }

  return message.content.map((block) => {
    if (block.type === 'text') return { type: 'text', text: block.text };
    if (!canSendImage(block, images)) return { type: 'text', text: imagePlaceholder(block) };
    const url = block.type === 'image_url' ? block.url : dataUrl(block.mediaType, block.data);
    return { type: 'image_url', image_url: { url } };
  });
}

export function toWireToolCalls(toolCalls: readonly ToolCall[]): Array<Record<string, unknown>> {
  return toolCalls.map(call => ({
    id: call.id,
    type: call.type,
    function: { name: call.function.name, arguments: call.function.arguments },
  }));
}

/**
 * Convert canonical messages to Chat Completions format.
 */
export function convertMessagesToOpenAI(messages: readonly Message[], images: ImageSupport): WireMessage[] {
  const result: WireMessage[] = [];

  for (const msg of messages) {
    switch (msg.role) {
      case 'system':
        result.push({ role: 'system', content: flattenContent(msg.content) });
        break;
      case 'user':
        result.push({ role: 'user', content: convertUserContent(msg, images) });
        break;
      case 'assistant': {
        const text = flattenContent(msg.content);
        const assistantMsg: WireMessage = { role: 'assistant', content: text || null };
        if (msg.toolCalls && msg.toolCalls.length > 0) {
          assistantMsg.tool_calls = toWireToolCalls(msg.toolCalls);
        }
        result.push(assistantMsg);
        break;
      }
      case 'tool':
        result.push({
          role: 'tool',
          tool_call_id: msg.toolCallId ?? '',
          content: flattenContent(msg.content),
        });
        break;
    }
  }

  return result;
}

export function toOpenAITools(tools: ToolDefinition[]): Array<Record<string, unknown>> {
  return tools.map(tool => ({
    type: 'function',
    function: {
      name: tool.name,
      ...(tool.description !== undefined ? { description: tool.description } : {}),
      parameters: tool.parameters,
    },
  }));
}

export function toOpenAIToolChoice(choice: ToolChoice): unknown {
  if (typeof choice === 'string') return choice;
  return { type: 'function', function: { name: choice.name } };
}

/**
 * Parse `message.tool_calls` of a complete response.
 */
export function parseOpenAIToolCalls(raw: unknown): ToolCall[] {
  if (!Array.isArray(raw)) return [];
  const calls: ToolCall[] = [];
  raw.forEach((item, position) => {
    if (!isRecord(item)) return;
    const fn = getRecord(item, 'function');
    const name = getString(fn, 'name');
    if (!name) return;
    calls.push({
      id: getString(item, 'id') ?? `call_${position}`,
      type: 'function',
      function: { name, arguments: argumentsText(fn?.arguments) },
      index: getNumber(item, 'index') ?? position,
    });
  });
  return calls;
}

function buildBody(request: ChatRequest, images: ImageSupport, stream: boolean): Record<string, unknown> {
  const body: Record<string, unknown> = {
    model: request.model,
    messages: convertMessagesToOpenAI(request.messages, images),
  };

  const sampling = request.sampling;
  if (sampling?.maxTokens !== undefined) body.max_tokens = sampling.maxTokens;
  if (sampling?.temperature !== undefined) body.temperature = sampling.temperature;
  if (sampling?.topP !== undefined) body.top_p = sampling.topP;
  if (sampling?.stop && sampling.stop.length > 0) body.stop = sampling.stop;
  if (sampling?.presencePenalty !== undefined) body.presence_penalty = sampling.presencePenalty;
  if (sampling?.frequencyPenalty !== undefined) body.frequency_penalty = sampling.frequencyPenalty;
  if (sampling?.seed !== undefined) body.seed = sampling.seed;

  if (request.responseFormat) body.response_format = { type: request.responseFormat.type };
  if (request.user) body.user = request.user;

  if (request.tools && request.tools.length > 0) {
    body.tools = toOpenAITools(request.tools);
  }
  if (request.toolChoice !== undefined) {
    body.tool_choice = toOpenAIToolChoice(request.toolChoice);
  }

  if (stream) {
    body.stream = true;
    body.stream_options = { include_usage: true };
  }

  return body;
}

export function createOpenAICodec(): ProtocolCodec {
  return {
    protocol: 'openai',

    buildRequest(request: ChatRequest, target: RequestTarget, stream: boolean): WireRequest {
      return {
        method: 'POST',
        url: `${resolveBaseUrl(target)}/chat/completions`,
        headers: {
          ...this.authHeaders(target.credentials),
          ...this.protocolHeaders(stream),
        },
        body: JSON.stringify(buildBody(request, target.vendor.images, stream)),
      };
    },

    authHeaders(credentials: Credentials): Record<string, string> {
      return bearerAuth(credentials.apiKey);
    },

    protocolHeaders(): Record<string, string> {
      return {};
    },

    parseResponse(body: string, context: ResponseContext): ChatResponse {
      const json = parseJsonBody(body, context.vendor);

      const error = getRecord(json, 'error');
      if (error && !json.choices) {
        throw vendorError(
          context.vendor,
          getString(error, 'message') ?? 'request failed',
          getString(error, 'code') ?? getString(error, 'type'),
          body,
        );
      }

      const choice = getRecords(json, 'choices')[0];
      const message = getRecord(choice, 'message');
      const toolCalls = parseOpenAIToolCalls(message?.tool_calls);
      const finishReason = getString(choice, 'finish_reason');
      const usage = getRecord(json, 'usage');

      const response: ChatResponse = {
        model: getString(json, 'model') ?? context.model,
        content: getString(message, 'content') ?? '',
        toolCalls,
        finishReason: finishReason ? mapOpenAIFinishReason(finishReason, toolCalls.length > 0) : 'stop',
        usage: makeUsage(
          getNumber(usage, 'prompt_tokens'),
          getNumber(usage, 'completion_tokens'),
          getNumber(usage, 'total_tokens'),
        ),
      };

      const id = getString(json, 'id');
      if (id) response.id = id;
      const reasoning = getString(message, 'reasoning_content') ?? getString(message, 'reasoning');
      if (reasoning) response.reasoningContent = reasoning;
      return response;
    },

    parseError(status: number, body: string, vendor: VendorId): LlmError {
      const json = errorEnvelope(body);
      const error = getRecord(json, 'error');
      const message = getString(error, 'message') ?? getString(json, 'message');
      const type = getString(error, 'code') ?? getString(error, 'type');
      return httpError(status, body, vendor, { message, type });
    },

    createEventMapper(vendor: VendorId) {
      return createOpenAIEventMapper(vendor);
    },

    models: {
      request: (target: RequestTarget): ModelsRequest => ({
        url: `${resolveBaseUrl(target)}/models`,
        headers: bearerAuth(target.credentials.apiKey),
      }),
      parse: parseModelList,
    },
  };
}
