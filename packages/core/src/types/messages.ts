export type Role = 'system' | 'user' | 'assistant' | 'tool';

export interface TextBlock {
  type: 'text';
  text: string;
}

export interface ImageUrlBlock {
  type: 'image_url';
  url: string;
}

export interface ImageDataBlock {
  type: 'image_data';
  /** e.g. "image/png" */
  mediaType: string;
  /** Base64 payload, without a data: URL prefix */
  data: string;
}

export type ContentBlock = TextBlock | ImageUrlBlock | ImageDataBlock;

export interface FunctionCall {
  name: string;
  /** Raw JSON text as produced by the model. Never parsed while streaming. */
  arguments: string;
}

export interface ToolCall {
  id: string;
  type: 'function';
  function: FunctionCall;
  /** Position among concurrent calls in one response; 0 for non-streaming responses */
  index: number;
}

export interface Message {
  readonly role: Role;
  readonly content: readonly ContentBlock[];
  /** Calls requested by the assistant in this turn */
  readonly toolCalls?: readonly ToolCall[];
  /** For role "tool": the call this message answers */
  readonly toolCallId?: string;
  /** For role "tool": the function name, needed by vendors that key results by name */
  readonly name?: string;
}

export interface JsonSchema {
  type?: string;
  properties?: Record<string, JsonSchema>;
  required?: string[];
  description?: string;
  items?: JsonSchema;
  enum?: unknown[];
  [key: string]: unknown;
}

export interface ToolDefinition {
  name: string;
  description?: string;
  /** Passed through to the vendor untouched */
  parameters: JsonSchema;
}

export type ToolChoice =
  | 'auto'
  | 'none'
  | 'required'
  | { type: 'function'; name: string };

export interface SamplingParams {
  temperature?: number;
  topP?: number;
  maxTokens?: number;
  stop?: string[];
  /** -2.0 to 2.0 */
  presencePenalty?: number;
  /** -2.0 to 2.0 */
  frequencyPenalty?: number;
  seed?: number;
}

export type ResponseFormat = { type: 'text' } | { type: 'json_object' };

export interface ChatRequest {
  model: string;
  messages: readonly Message[];
  tools?: ToolDefinition[];
  sampling?: SamplingParams;
  toolChoice?: ToolChoice;
  responseFormat?: ResponseFormat;
  /** End-user identifier for the vendor's abuse monitoring */
  user?: string;
  /** Reasoning switch for hybrid models (DashScope `enable_thinking`); other protocols ignore it */
  enableThinking?: boolean;
}
