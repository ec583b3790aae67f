import type { SSEEvent } from '../types/provider.js';

export type { SSEEvent };

/**
 * Incremental Server-Sent-Events parser. Text may be fed in arbitrary
 * pieces; only events terminated by a blank line are returned.
 */
export class SSEParser {
  private pending = '';
  private eventType: string | undefined = undefined;
  private dataLines: string[] = [];

  feed(chunk: string): SSEEvent[] {
    const events: SSEEvent[] = [];
    const lines = (this.pending + chunk).split('\n');
    this.pending = lines.pop() ?? '';

    for (const rawLine of lines) {
      const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
      if (line === '') {
        const event = this.dispatch();
        if (event) events.push(event);
      } else {
        this.processField(line);
      }
    }

    return events;
  }

  reset(): void {
    this.pending = '';
    this.clearEvent();
  }

  private processField(line: string): void {
    // Comment / heartbeat
    if (line.startsWith(':')) return;

    const colon = line.indexOf(':');
    const field = colon === -1 ? line : line.slice(0, colon);
    const value = colon === -1 ? '' : stripFramingSpace(line.slice(colon + 1));

    switch (field) {
      case 'event':
        this.eventType = value || undefined;
        break;
      case 'data':
        this.dataLines.push(value);
        break;
      // id, retry and unknown fields are not used by any vendor
    }
  }

  /** Close the current block; blocks without data lines produce nothing. */
  private dispatch(): SSEEvent | undefined {
    const event = this.dataLines.length > 0
      ? { event: this.eventType, data: this.dataLines.join('\n') }
      : undefined;
    this.clearEvent();
    return event;
  }

  private clearEvent(): void {
    this.eventType = undefined;
    this.dataLines = [];
  }
}

function stripFramingSpace(value: string): string {
  return value.startsWith(' ') ? value.slice(1) : value;
}
