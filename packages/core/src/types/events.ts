import type { ToolCall } from './messages.js';
import type { FinishReason, TokenUsage } from './response.js';
import type { LlmError } from '../errors.js';

export interface MessageStartChunk {
  type: 'message_start';
  id: string;
  model?: string;
}

export interface TextDeltaChunk {
  type: 'text_delta';
  text: string;
}

export interface ReasoningDeltaChunk {
  type: 'reasoning_delta';
  text: string;
}

/**
 * Always carries a structurally complete call. The same index may be
 * reported again as more argument fragments arrive; the last value seen
 * before `finish` is the final one.
 */
export interface ToolCallDeltaChunk {
  type: 'tool_call_delta';
  toolCall: ToolCall;
}

export interface UsageChunk {
  type: 'usage';
  usage: TokenUsage;
}

export interface FinishChunk {
  type: 'finish';
  reason: FinishReason;
}

export type StreamChunk =
  | MessageStartChunk
  | TextDeltaChunk
  | ReasoningDeltaChunk
  | ToolCallDeltaChunk
  | UsageChunk
  | FinishChunk;

/** Whatever subset of a tool call one vendor event supplies. */
export interface ToolCallDelta {
  index: number;
  id?: string;
  type?: string;
  name?: string;
  arguments?: string;
}

export interface ToolCallFragmentEvent {
  type: 'tool_call_fragment';
  delta: ToolCallDelta;
}

/** The vendor's terminal marker (`[DONE]`, `message_stop`). */
export interface DoneEvent {
  type: 'done';
}

export interface StreamErrorEvent {
  type: 'error';
  error: LlmError;
}

/** Output of a vendor event mapper, before tool-call accumulation. */
export type VendorEvent =
  | MessageStartChunk
  | TextDeltaChunk
  | ReasoningDeltaChunk
  | ToolCallFragmentEvent
  | UsageChunk
  | FinishChunk
  | DoneEvent
  | StreamErrorEvent;
