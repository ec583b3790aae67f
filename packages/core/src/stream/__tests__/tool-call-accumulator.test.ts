import { describe, it, expect, beforeEach } from 'vitest';
import type { ToolCall } from '../../types/messages.js';
import type { ToolCallDelta } from '../../types/events.js';
import { ToolCallAccumulator } from '../tool-call-accumulator.js';

const ARGS = '{"city":"Paris","units":"metric","days":[1,2]}';

/** Deterministic generator, so a failing sequence can be replayed by seed */
function seededRandom(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 1664525 + 1013904223) % 4294967296;
    return state / 4294967296;
  };
}

function withField(delta: ToolCallDelta, field: 'id' | 'type' | 'name'): ToolCallDelta {
  switch (field) {
    case 'id':
      return { ...delta, id: 'call_7' };
    case 'type':
      return { ...delta, type: 'function' };
    case 'name':
      return { ...delta, name: 'search' };
  }
}

/** Push every delta and return what the accumulator reported. */
function feed(acc: ToolCallAccumulator, deltas: ToolCallDelta[]): ToolCall[] {
  const reported: ToolCall[] = [];
  for (const delta of deltas) {
    const call = acc.push(delta);
    if (call) reported.push(call);
  }
  return reported;
}

describe('ToolCallAccumulator', () => {
  let acc: ToolCallAccumulator;

  beforeEach(() => {
    acc = new ToolCallAccumulator();
  });

  it('reports nothing until id, type and name are all known', () => {
    expect(acc.push({ index: 0, id: 'call_1' })).toBeUndefined();
    expect(acc.push({ index: 0, arguments: '{"a"' })).toBeUndefined();

    expect(acc.push({ index: 0, type: 'function', name: 'lookup' })).toEqual({
      id: 'call_1',
      type: 'function',
      function: { name: 'lookup', arguments: '{"a"' },
      index: 0,
    });
  });

  it('re-reports a complete call as arguments grow', () => {
    acc.push({ index: 0, id: 'call_1', type: 'function', name: 'get_weather' });
    const first = acc.push({ index: 0, arguments: '{"city":' });
    const second = acc.push({ index: 0, arguments: '"Paris"}' });

    expect(first?.function.arguments).toBe('{"city":');
    expect(second?.function.arguments).toBe('{"city":"Paris"}');
  });

  it('does not re-report a delta that changes nothing', () => {
    expect(acc.push({ index: 0, id: 'call_1', type: 'function', name: 'f' })).toBeDefined();
    expect(acc.push({ index: 0, id: 'call_1', name: 'f' })).toBeUndefined();
    expect(acc.push({ index: 0, arguments: '' })).toBeUndefined();
  });

  it('keeps the stored id when a later delta carries an empty one', () => {
    acc.push({ index: 0, id: 'call_1', type: 'function', name: 'f' });
    const call = acc.push({ index: 0, id: '', name: '', arguments: '{}' });
    expect(call?.id).toBe('call_1');
    expect(call?.function.name).toBe('f');
  });

  it('overwrites id and name with later non-empty values', () => {
    acc.push({ index: 0, id: 'tmp', type: 'function', name: 'f' });
    const call = acc.push({ index: 0, id: 'call_real' });
    expect(call?.id).toBe('call_real');
  });

  it('tracks concurrent calls by index independently', () => {
    expect(acc.push({ index: 1, id: 'b', type: 'function', name: 'second', arguments: '{"x":' })).toEqual(
      { id: 'b', type: 'function', function: { name: 'second', arguments: '{"x":' }, index: 1 },
    );
    expect(acc.push({ index: 0, id: 'a', type: 'function', name: 'first', arguments: '{}' })).toEqual(
      { id: 'a', type: 'function', function: { name: 'first', arguments: '{}' }, index: 0 },
    );
    expect(acc.push({ index: 1, arguments: '1}' })).toEqual(
      { id: 'b', type: 'function', function: { name: 'second', arguments: '{"x":1}' }, index: 1 },
    );
  });

  it('rebuilds the arguments for every way of cutting them into three fragments', () => {
    for (let i = 0; i <= ARGS.length; i++) {
      for (let j = i; j <= ARGS.length; j++) {
        const reported = feed(new ToolCallAccumulator(), [
          { index: 0, id: 'call_7', type: 'function', name: 'search' },
          { index: 0, arguments: ARGS.slice(0, i) },
          { index: 0, arguments: ARGS.slice(i, j) },
          { index: 0, arguments: ARGS.slice(j) },
        ]);
        expect(reported[reported.length - 1]?.function.arguments).toBe(ARGS);
      }
    }
  });

  it('never reports a call without id, type and name, whatever order they arrive in', () => {
    for (let seed = 1; seed <= 200; seed++) {
      const random = seededRandom(seed);
      const pick = (n: number) => Math.floor(random() * n);

      const cuts = [...new Set(Array.from({ length: pick(6) }, () => pick(ARGS.length + 1)))].sort((a, b) => a - b);
      const bounds = [0, ...cuts, ARGS.length];
      let deltas: ToolCallDelta[] = bounds.slice(1).map((end, k) => ({ index: 0, arguments: ARGS.slice(bounds[k], end) }));

      const fields: Array<'id' | 'type' | 'name'> = ['id', 'type', 'name'];
      while (fields.length > 0) {
        const [field] = fields.splice(pick(fields.length), 1);
        const at = pick(deltas.length + 1);
        if (at === deltas.length) {
          deltas = [...deltas, withField({ index: 0 }, field)];
        } else {
          deltas = deltas.map((delta, k) => (k === at ? withField(delta, field) : delta));
        }
      }

      const reported = feed(new ToolCallAccumulator(), deltas);

      expect(reported.length).toBeGreaterThan(0);
      let previous = '';
      for (const call of reported) {
        expect(call.id).toBe('call_7');
        expect(call.type).toBe('function');
        expect(call.function.name).toBe('search');
        expect(ARGS.startsWith(call.function.arguments)).toBe(true);
        expect(call.function.arguments.length).toBeGreaterThanOrEqual(previous.length);
        previous = call.function.arguments;
      }
      expect(previous).toBe(ARGS);
    }
  });

  it('returns copies that later deltas do not mutate', () => {
    const first = acc.push({ index: 0, id: 'a', type: 'function', name: 'f', arguments: '{' });
    acc.push({ index: 0, arguments: '}' });
    expect(first?.function.arguments).toBe('{');
  });
});
