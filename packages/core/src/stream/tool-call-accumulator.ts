import type { ToolCall } from '../types/messages.js';
import type { ToolCallDelta } from '../types/events.js';

interface PartialToolCall {
  index: number;
  id: string;
  type: string;
  name: string;
  arguments: string;
}

/**
 * Reassembles fragmented tool calls for one stream.
 *
 * Merge rules per index: a non-empty id, type or name overwrites the stored
 * one; argument fragments are appended in arrival order and never replaced.
 *
 * Nothing is reported for an index until it has an id, a type and a function
 * name. From then on every delta that changes the call reports the updated
 * complete value, so consumers see zero or more increasingly complete values
 * per index and the last one is final. Consumers that expect a single report
 * per call should keep the latest value per index (see `collectStream`).
 */
export class ToolCallAccumulator {
  private readonly calls = new Map<number, PartialToolCall>();
  private readonly reported = new Set<number>();

  /**
   * Merge one delta. Returns the complete call when this delta made it
   * complete or changed an already complete call, otherwise undefined.
   */
  push(delta: ToolCallDelta): ToolCall | undefined {
    let call = this.calls.get(delta.index);
    if (!call) {
      call = { index: delta.index, id: '', type: '', name: '', arguments: '' };
      this.calls.set(delta.index, call);
    }

    let changed = false;
    if (delta.id && delta.id !== call.id) {
      call.id = delta.id;
      changed = true;
    }
    if (delta.type && delta.type !== call.type) {
      call.type = delta.type;
      changed = true;
    }
    if (delta.name && delta.name !== call.name) {
      call.name = delta.name;
      changed = true;
    }
    if (delta.arguments) {
      call.arguments += delta.arguments;
      changed = true;
    }
    call.index = delta.index;

    if (!isComplete(call)) return undefined;

    const firstReport = !this.reported.has(delta.index);
    if (!firstReport && !changed) return undefined;

    this.reported.add(delta.index);
    return toToolCall(call);
  }
}

function isComplete(call: PartialToolCall): boolean {
  return call.id !== '' && call.type !== '' && call.name !== '';
}

function toToolCall(call: PartialToolCall): ToolCall {
  // Only "function" calls exist today; any other kind a vendor sends is reported as one
  return {
    id: call.id,
    type: 'function',
    function: { name: call.name, arguments: call.arguments },
    index: call.index,
  };
}
