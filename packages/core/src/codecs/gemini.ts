import type { ChatRequest, ContentBlock, Message, ToolCall, ToolChoice } from '../types/messages.js';
import type { ChatResponse } from '../types/response.js';
import type {
  Credentials, ImageSupport, ModelsRequest, ProtocolCodec, RequestTarget, ResponseContext, VendorId, WireRequest,
} from '../types/provider.js';
import type { LlmError } from '../errors.js';
import { createGeminiEventMapper, geminiCallDelta, geminiUsage, mapGeminiFinishReason } from '../events/gemini.js';
import { getRecord, getRecords, getString, isRecord, tryParseJson, type JsonRecord } from '../utils/json.js';
import {
  canSendImage, errorEnvelope, flattenContent, httpError, imagePlaceholder, makeUsage,
  mergeAdjacentByRole, parseArguments, parseJsonBody, resolveBaseUrl, vendorError,
} from './shared.js';

/**
 * Convert a JSON Schema to Gemini's native format.
 *
 * Gemini requires type strings in UPPERCASE, objects must have `properties`,
 * and `additionalProperties` is not supported.
 */
export function convertToolSchema(schema: JsonRecord): JsonRecord {
  const result: JsonRecord = { ...schema };
  delete result.additionalProperties;

  if (typeof result.type === 'string') {
    result.type = result.type.toUpperCase();
  }

  if (result.type === 'OBJECT' && !result.properties) {
    result.properties = {};
  }

  if (isRecord(result.properties)) {
    const props: JsonRecord = {};
    for (const [key, value] of Object.entries(result.properties)) {
      props[key] = isRecord(value) ? convertToolSchema(value) : value;
    }
    result.properties = props;
  }

  if (isRecord(result.items)) {
    result.items = convertToolSchema(result.items);
  }

  return result;
}

type WirePart = Record<string, unknown>;

interface WireContent {
  role: 'user' | 'model';
  parts: WirePart[];
}

function convertBlock(block: ContentBlock, images: ImageSupport): WirePart {
  if (block.type === 'text') return { text: block.text };
  if (block.type === 'image_data' && canSendImage(block, images)) {
    return { inlineData: { mimeType: block.mediaType, data: block.data } };
  }
  return { text: imagePlaceholder(block) };
}

function functionResponse(content: string): JsonRecord {
  const parsed = tryParseJson(content);
  return parsed.ok && isRecord(parsed.value) ? parsed.value : { result: content };
}

/**
 * Convert canonical messages to Gemini native format.
 *
 * Returns `{ systemInstruction?, contents }` where contents is an array of
 * `{ role, parts }` objects with strict role alternation (user/model).
 */
export function convertMessagesToGemini(
  messages: readonly Message[],
  images: ImageSupport,
  vendor: VendorId = 'gemini',
): { systemInstruction?: JsonRecord; contents: WireContent[] } {
  const systemParts: string[] = [];
  const converted: WireContent[] = [];

  // Tool results are keyed by function name, not call id
  const callNames = new Map<string, string>();

  for (const msg of messages) {
    switch (msg.role) {
      case 'system':
        systemParts.push(flattenContent(msg.content));
        break;
      case 'user':
        converted.push({ role: 'user', parts: msg.content.map(b => convertBlock(b, images)) });
        break;
      case 'assistant': {
        const parts: WirePart[] = msg.content
          .filter(b => b.type !== 'text' || b.text !== '')
          .map(b => convertBlock(b, images));
        for (const call of msg.toolCalls ?? []) {
          callNames.set(call.id, call.function.name);
          parts.push({ functionCall: { name: call.function.name, args: parseArguments(call, vendor) } });
        }
        if (parts.length > 0) converted.push({ role: 'model', parts });
        break;
      }
      case 'tool': {
        const name = msg.name ?? callNames.get(msg.toolCallId ?? '') ?? 'unknown';
        converted.push({
          role: 'user',
          parts: [{ functionResponse: { name, response: functionResponse(flattenContent(msg.content)) } }],
        });
        break;
      }
    }
  }

  const contents = mergeAdjacentByRole(converted, (into, from) => {
    into.parts.push(...from.parts);
  });

  const system = systemParts.filter(part => part !== '').join('\n\n');
  return system ? { systemInstruction: { parts: [{ text: system }] }, contents } : { contents };
}

export function toGeminiToolConfig(choice: ToolChoice): JsonRecord {
  if (typeof choice !== 'string') {
    return { functionCallingConfig: { mode: 'ANY', allowedFunctionNames: [choice.name] } };
  }
  const mode = choice === 'required' ? 'ANY' : choice === 'none' ? 'NONE' : 'AUTO';
  return { functionCallingConfig: { mode } };
}

function buildBody(request: ChatRequest, target: RequestTarget): JsonRecord {
  const { systemInstruction, contents } = convertMessagesToGemini(request.messages, target.vendor.images, target.vendor.id);

  const body: JsonRecord = { contents };
  if (systemInstruction) body.systemInstruction = systemInstruction;

  if (request.tools && request.tools.length > 0) {
    body.tools = [{
      functionDeclarations: request.tools.map(t => ({
        name: t.name,
        ...(t.description !== undefined ? { description: t.description } : {}),
        parameters: convertToolSchema(t.parameters),
      })),
    }];
  }
  if (request.toolChoice !== undefined) {
    body.toolConfig = toGeminiToolConfig(request.toolChoice);
  }

  const sampling = request.sampling;
  const generationConfig: JsonRecord = {};
  if (sampling?.maxTokens !== undefined) generationConfig.maxOutputTokens = sampling.maxTokens;
  if (sampling?.temperature !== undefined) generationConfig.temperature = sampling.temperature;
  if (sampling?.topP !== undefined) generationConfig.topP = sampling.topP;
  if (sampling?.stop && sampling.stop.length > 0) generationConfig.stopSequences = sampling.stop;
  if (sampling?.presencePenalty !== undefined) generationConfig.presencePenalty = sampling.presencePenalty;
  if (sampling?.frequencyPenalty !== undefined) generationConfig.frequencyPenalty = sampling.frequencyPenalty;
  if (sampling?.seed !== undefined) generationConfig.seed = sampling.seed;
  if (request.responseFormat?.type === 'json_object') generationConfig.responseMimeType = 'application/json';
  if (Object.keys(generationConfig).length > 0) body.generationConfig = generationConfig;

  return body;
}

function geminiAuth(credentials: Credentials): Record<string, string> {
  return credentials.apiKey ? { 'x-goog-api-key': credentials.apiKey } : {};
}

/** Model names come back as "models/<id>"; the chat URL takes the bare id. */
export function parseGeminiModels(body: string, vendor: VendorId): string[] {
  return getRecords(parseJsonBody(body, vendor), 'models')
    .map(model => getString(model, 'name')?.replace(/^models\//, ''))
    .filter((name): name is string => name !== undefined && name !== '');
}

/**
 * Codec for Google's native generateContent API (not its OpenAI-compatible
 * endpoint). The model goes in the URL path, not the body.
 */
export function createGeminiCodec(): ProtocolCodec {
  return {
    protocol: 'gemini',

    buildRequest(request: ChatRequest, target: RequestTarget, stream: boolean): WireRequest {
      const method = stream ? 'streamGenerateContent?alt=sse' : 'generateContent';
      return {
        method: 'POST',
        url: `${resolveBaseUrl(target)}/models/${encodeURIComponent(request.model)}:${method}`,
        headers: {
          ...this.authHeaders(target.credentials),
          ...this.protocolHeaders(stream),
        },
        body: JSON.stringify(buildBody(request, target)),
      };
    },

    authHeaders(credentials: Credentials): Record<string, string> {
      return geminiAuth(credentials);
    },

    protocolHeaders(): Record<string, string> {
      return {};
    },

    parseResponse(body: string, context: ResponseContext): ChatResponse {
      const json = parseJsonBody(body, context.vendor);

      const error = getRecord(json, 'error');
      if (error) {
        throw vendorError(context.vendor, getString(error, 'message') ?? 'request failed', getString(error, 'status'), body);
      }

      const candidate = getRecords(json, 'candidates')[0];
      let content = '';
      let reasoning = '';
      const toolCalls: ToolCall[] = [];
      for (const part of getRecords(getRecord(candidate, 'content'), 'parts')) {
        const text = getString(part, 'text');
        if (text) {
          if (part.thought === true) reasoning += text;
          else content += text;
        }
        const call = getRecord(part, 'functionCall');
        const delta = call && geminiCallDelta(call, toolCalls.length);
        if (delta?.name) {
          toolCalls.push({
            id: delta.id ?? `gemini_call_${delta.index}`,
            type: 'function',
            function: { name: delta.name, arguments: delta.arguments ?? '{}' },
            index: delta.index,
          });
        }
      }

      const finishReason = getString(candidate, 'finishReason');
      const blocked = getString(getRecord(json, 'promptFeedback'), 'blockReason');
      const usage = getRecord(json, 'usageMetadata');

      const response: ChatResponse = {
        model: getString(json, 'modelVersion') ?? context.model,
        content,
        toolCalls,
        finishReason: finishReason
          ? mapGeminiFinishReason(finishReason, toolCalls.length > 0)
          : blocked ? 'content_filter' : 'stop',
        usage: usage ? geminiUsage(usage) : makeUsage(0, 0),
      };
      const id = getString(json, 'responseId');
      if (id) response.id = id;
      if (reasoning) response.reasoningContent = reasoning;
      return response;
    },

    parseError(status: number, body: string, vendor: VendorId): LlmError {
      const error = getRecord(errorEnvelope(body), 'error');
      return httpError(status, body, vendor, {
        message: getString(error, 'message'),
        type: getString(error, 'status'),
      });
    },

    createEventMapper(vendor: VendorId) {
      return createGeminiEventMapper(vendor);
    },

    models: {
      request: (target: RequestTarget): ModelsRequest => ({
        url: `${resolveBaseUrl(target)}/models`,
        headers: geminiAuth(target.credentials),
      }),
      parse: parseGeminiModels,
    },
  };
}
