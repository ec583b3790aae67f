import type { ChatRequest, ContentBlock, Message, ToolCall, ToolChoice } from '../types/messages.js';
import type { ChatResponse } from '../types/response.js';
import type {
  Credentials, ImageSupport, ModelsRequest, ProtocolCodec, RequestTarget, ResponseContext, VendorId, WireRequest,
} from '../types/provider.js';
import type { LlmError } from '../errors.js';
import { createAnthropicEventMapper, mapAnthropicStopReason } from '../events/anthropic.js';
import { getNumber, getRecord, getRecords, getString } from '../utils/json.js';
import {
  argumentsText, canSendImage, errorEnvelope, flattenContent, httpError, imagePlaceholder,
  makeUsage, mergeAdjacentByRole, parseArguments, parseJsonBody, parseModelList, resolveBaseUrl, vendorError,
} from './shared.js';

export const ANTHROPIC_VERSION = '2023-06-01';

// The Messages API requires max_tokens
export const DEFAULT_MAX_TOKENS = 4096;

type WireBlock = Record<string, unknown>;

interface WireMessage {
  role: 'user' | 'assistant';
  content: WireBlock[];
}

function convertBlock(block: ContentBlock, images: ImageSupport): WireBlock {
  if (block.type === 'text') return { type: 'text', text: block.text };
  if (!canSendImage(block, images)) return { type: 'text', text: imagePlaceholder(block) };
  if (block.type === 'image_url') {
    return { type: 'image', source: { type: 'url', url: block.url } };
  }
  return { type: 'image', source: { type: 'base64', media_type: block.mediaType, data: block.data } };
}

function toolUseBlocks(toolCalls: readonly ToolCall[], vendor: VendorId): WireBlock[] {
  return toolCalls.map(call => ({
    type: 'tool_use',
    id: call.id,
    name: call.function.name,
    input: parseArguments(call, vendor),
  }));
}

/**
 * Convert canonical messages to Messages API format. System messages are
 * lifted out; tool results travel as user turns; adjacent turns with the
 * same role are merged, since the API requires alternation.
 */
export function convertMessagesToAnthropic(
  messages: readonly Message[],
  images: ImageSupport,
  vendor: VendorId = 'anthropic',
): { system?: string; messages: WireMessage[] } {
  const systemParts: string[] = [];
  const converted: WireMessage[] = [];

  for (const msg of messages) {
    switch (msg.role) {
      case 'system':
        systemParts.push(flattenContent(msg.content));
        break;
      case 'user':
        converted.push({ role: 'user', content: msg.content.map(b => convertBlock(b, images)) });
        break;
      case 'assistant': {
        const content: WireBlock[] = msg.content
          .filter(b => b.type !== 'text' || b.text !== '')
          .map(b => convertBlock(b, images));
        if (msg.toolCalls) content.push(...toolUseBlocks(msg.toolCalls, vendor));
        if (content.length > 0) converted.push({ role: 'assistant', content });
        break;
      }
      case 'tool':
        converted.push({
          role: 'user',
          content: [{
            type: 'tool_result',
            tool_use_id: msg.toolCallId ?? '',
            content: flattenContent(msg.content),
          }],
        });
        break;
    }
  }

  const merged = mergeAdjacentByRole(converted, (into, from) => {
    into.content.push(...from.content);
  });

  const system = systemParts.filter(part => part !== '').join('\n\n');
  return system ? { system, messages: merged } : { messages: merged };
}

export function toAnthropicToolChoice(choice: ToolChoice): Record<string, unknown> {
  if (typeof choice !== 'string') return { type: 'tool', name: choice.name };
  switch (choice) {
    case 'auto':
      return { type: 'auto' };
    case 'required':
      return { type: 'any' };
    case 'none':
      return { type: 'none' };
  }
}

function buildBody(request: ChatRequest, target: RequestTarget, stream: boolean): Record<string, unknown> {
  const { system, messages } = convertMessagesToAnthropic(request.messages, target.vendor.images, target.vendor.id);
  const sampling = request.sampling;

  const body: Record<string, unknown> = {
    model: request.model,
    max_tokens: sampling?.maxTokens ?? DEFAULT_MAX_TOKENS,
    messages,
  };
  if (system) body.system = system;
  if (sampling?.temperature !== undefined) body.temperature = sampling.temperature;
  if (sampling?.topP !== undefined) body.top_p = sampling.topP;
  if (sampling?.stop && sampling.stop.length > 0) body.stop_sequences = sampling.stop;
  // No penalties, seed or response format on the Messages API
  if (request.user) body.metadata = { user_id: request.user };

  if (request.tools && request.tools.length > 0) {
    body.tools = request.tools.map(t => ({
      name: t.name,
      ...(t.description !== undefined ? { description: t.description } : {}),
      input_schema: t.parameters,
    }));
  }
  if (request.toolChoice !== undefined) {
    body.tool_choice = toAnthropicToolChoice(request.toolChoice);
  }
  if (stream) body.stream = true;

  return body;
}

function anthropicAuth(credentials: Credentials): Record<string, string> {
  return credentials.apiKey ? { 'x-api-key': credentials.apiKey } : {};
}

export function createAnthropicCodec(): ProtocolCodec {
  return {
    protocol: 'anthropic',

    buildRequest(request: ChatRequest, target: RequestTarget, stream: boolean): WireRequest {
      return {
        method: 'POST',
        url: `${resolveBaseUrl(target)}/v1/messages`,
        headers: {
          ...this.authHeaders(target.credentials),
          ...this.protocolHeaders(stream),
        },
        body: JSON.stringify(buildBody(request, target, stream)),
      };
    },

    authHeaders(credentials: Credentials): Record<string, string> {
      return anthropicAuth(credentials);
    },

    protocolHeaders(): Record<string, string> {
      return { 'anthropic-version': ANTHROPIC_VERSION };
    },

    parseResponse(body: string, context: ResponseContext): ChatResponse {
      const json = parseJsonBody(body, context.vendor);

      if (getString(json, 'type') === 'error') {
        const error = getRecord(json, 'error');
        throw vendorError(context.vendor, getString(error, 'message') ?? 'request failed', getString(error, 'type'), body);
      }

      let content = '';
      let reasoning = '';
      const toolCalls: ToolCall[] = [];
      for (const block of getRecords(json, 'content')) {
        switch (getString(block, 'type')) {
          case 'text':
            content += getString(block, 'text') ?? '';
            break;
          case 'thinking':
            reasoning += getString(block, 'thinking') ?? '';
            break;
          case 'tool_use': {
            const name = getString(block, 'name');
            if (!name) break;
            toolCalls.push({
              id: getString(block, 'id') ?? `toolu_${toolCalls.length}`,
              type: 'function',
              function: { name, arguments: argumentsText(block.input) },
              index: toolCalls.length,
            });
            break;
          }
        }
      }

      const usage = getRecord(json, 'usage');
      const stopReason = getString(json, 'stop_reason');
      const response: ChatResponse = {
        model: getString(json, 'model') ?? context.model,
        content,
        toolCalls,
        finishReason: stopReason ? mapAnthropicStopReason(stopReason) : 'stop',
        usage: makeUsage(getNumber(usage, 'input_tokens'), getNumber(usage, 'output_tokens')),
      };
      const id = getString(json, 'id');
      if (id) response.id = id;
      if (reasoning) response.reasoningContent = reasoning;
      return response;
    },

    parseError(status: number, body: string, vendor: VendorId): LlmError {
      const error = getRecord(errorEnvelope(body), 'error');
      return httpError(status, body, vendor, {
        message: getString(error, 'message'),
        type: getString(error, 'type'),
      });
    },

    createEventMapper(vendor: VendorId) {
      return createAnthropicEventMapper(vendor);
    },

    models: {
      request: (target: RequestTarget): ModelsRequest => ({
        url: `${resolveBaseUrl(target)}/v1/models`,
        headers: { ...anthropicAuth(target.credentials), 'anthropic-version': ANTHROPIC_VERSION },
      }),
      parse: parseModelList,
    },
  };
}
