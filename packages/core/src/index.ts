export * from './types/index.js';
export {
  LlmError,
  isLlmError,
  errorKindFromStatus,
  errorKindFromVendorType,
  type LlmErrorKind,
  type LlmErrorOptions,
} from './errors.js';
export {
  createMessage,
  systemMessage,
  userMessage,
  assistantMessage,
  toolResultMessage,
} from './message-builders.js';
export { getVendor, listVendors, isVendorId, getCodec } from './vendors.js';
export { SSEParser } from './stream/sse-parser.js';
export { readSSEEvents, type ByteSource } from './stream/sse-reader.js';
export { ToolCallAccumulator } from './stream/tool-call-accumulator.js';
export { streamChatChunks } from './stream/pipeline.js';
export { collectStream } from './stream/collect.js';
export { createOpenAICodec } from './codecs/openai.js';
export { createAnthropicCodec, ANTHROPIC_VERSION, DEFAULT_MAX_TOKENS } from './codecs/anthropic.js';
export { createGeminiCodec, convertToolSchema } from './codecs/gemini.js';
export { createAliyunCodec } from './codecs/aliyun.js';
export { createOpenAIEventMapper } from './events/openai.js';
export { createAnthropicEventMapper } from './events/anthropic.js';
export { createGeminiEventMapper } from './events/gemini.js';
export { createAliyunEventMapper } from './events/aliyun.js';
