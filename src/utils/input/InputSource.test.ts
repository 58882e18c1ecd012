/**
 * Input source tests
 */

import { Readable } from 'stream';
import { describe, it, expect, vi, afterEach } from 'vitest';
import { QueuedInputSource, type InputPoll } from './InputSource';
import { JsonLinesInputSource } from './JsonLinesInputSource';
import { KeyboardManager } from '../KeyboardManager';
import { Logger, LogLevel } from '../Logger';
import { InputError } from '../../core/errors';

async function drain(source: QueuedInputSource): Promise<InputPoll[]> {
  const polls: InputPoll[] = [];
  for (;;) {
    const poll = await source.next(1000);
    polls.push(poll);
    if (poll.kind === 'end' || poll.kind === 'error') return polls;
  }
}

describe('QueuedInputSource', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('SRC-001: delivers queued events in order', async () => {
    const source = new QueuedInputSource();
    source.push({ type: 'command', command: 'next' }, { type: 'wheel', direction: 'in', modifier: 'none' });

    expect(source.pending).toBe(2);
    expect(await source.next(10)).toEqual({ kind: 'event', event: { type: 'command', command: 'next' } });
    expect(await source.next(10)).toEqual({
      kind: 'event',
      event: { type: 'wheel', direction: 'in', modifier: 'none' },
    });
  });

  it('SRC-002: reports idle when nothing arrives in time', async () => {
    vi.useFakeTimers();
    const source = new QueuedInputSource();

    const poll = source.next(17);
    await vi.advanceTimersByTimeAsync(17);

    expect(await poll).toEqual({ kind: 'idle' });
  });

  it('SRC-003: a push wakes a waiting poll', async () => {
    const source = new QueuedInputSource();

    const poll = source.next(60_000);
    source.push({ type: 'command', command: 'quit' });

    expect(await poll).toEqual({ kind: 'event', event: { type: 'command', command: 'quit' } });
  });

  it('SRC-004: queued events drain before end is reported', async () => {
    const source = new QueuedInputSource();
    source.push({ type: 'command', command: 'next' });
    source.end();
    source.push({ type: 'command', command: 'quit' });

    expect((await source.next(10)).kind).toBe('event');
    expect(await source.next(10)).toEqual({ kind: 'end' });
    expect(await source.next(10)).toEqual({ kind: 'end' });
  });

  it('SRC-005: dispose drops queued events and ends the source', async () => {
    const source = new QueuedInputSource();
    source.push({ type: 'command', command: 'next' });

    source.dispose();

    expect(source.pending).toBe(0);
    expect(await source.next(10)).toEqual({ kind: 'end' });
  });

  it('SRC-006: a failure is reported after the queued events, on every poll', async () => {
    const source = new QueuedInputSource();
    const first = new Error('read failed');
    source.push({ type: 'command', command: 'next' });
    source.fail(first);
    source.fail(new Error('later failure'));

    expect((await source.next(10)).kind).toBe('event');
    expect(await source.next(10)).toEqual({ kind: 'error', error: first });
    expect(await source.next(10)).toEqual({ kind: 'error', error: first });
  });

  it('SRC-007: a failure wakes a waiting poll', async () => {
    const source = new QueuedInputSource();
    const error = new Error('read failed');

    const poll = source.next(60_000);
    source.fail(error);

    expect(await poll).toEqual({ kind: 'error', error });
  });
});

describe('JsonLinesInputSource', () => {
  afterEach(() => {
    Logger.setSink(null);
  });

  it('SRC-010: parses one event per line and ends with the stream', async () => {
    const stream = Readable.from([
      '{"type":"pointer","action":"down","x":5,"y":6,"button":"primary"}\n',
      '{"type":"command","command":"next"}\n',
    ]);
    const source = new JsonLinesInputSource(stream);

    expect(await drain(source)).toEqual([
      { kind: 'event', event: { type: 'pointer', action: 'down', x: 5, y: 6, button: 'primary' } },
      { kind: 'event', event: { type: 'command', command: 'next' } },
      { kind: 'end' },
    ]);
  });

  it('SRC-011: resolves keys through the keyboard bindings', async () => {
    const stream = Readable.from(['{"type":"key","key":"G"}\n', '{"type":"key","key":"q"}\n']);
    const source = new JsonLinesInputSource(stream);

    expect(await drain(source)).toEqual([
      { kind: 'event', event: { type: 'command', command: 'zoom-out-full' } },
      { kind: 'event', event: { type: 'command', command: 'quit' } },
      { kind: 'end' },
    ]);
  });

  it('SRC-012: uses a custom keyboard manager when given', async () => {
    const keyboard = new KeyboardManager();
    keyboard.register('x', 'next');
    const stream = Readable.from(['{"type":"key","key":"x"}\n', '{"type":"key","key":"n"}\n']);
    const source = new JsonLinesInputSource(stream, keyboard);

    expect(await drain(source)).toEqual([
      { kind: 'event', event: { type: 'command', command: 'next' } },
      { kind: 'end' },
    ]);
  });

  it('SRC-013: skips blank, comment and malformed lines with a warning', async () => {
    const sink = vi.fn();
    Logger.setSink(sink);
    const stream = Readable.from([
      '\n',
      '# replay of a short session\n',
      '{not json\n',
      '{"type":"wheel","direction":"sideways"}\n',
      '{"type":"command","command":"quit"}\n',
    ]);
    const source = new JsonLinesInputSource(stream);

    expect(await drain(source)).toEqual([
      { kind: 'event', event: { type: 'command', command: 'quit' } },
      { kind: 'end' },
    ]);
    const warnings = sink.mock.calls.filter((call) => call[0] === LogLevel.WARN);
    expect(warnings).toHaveLength(2);
    expect(String(warnings[0]?.[2])).toMatch(/^Line 3: /);
    expect(String(warnings[1]?.[2])).toMatch(/^Line 4: wheel\.direction must be one of in, out/);
  });

  it('SRC-014: a stream read error fails the source after the lines already read', async () => {
    const stream = new Readable({ read() {} });
    const source = new JsonLinesInputSource(stream);
    stream.push('{"type":"command","command":"next"}\n');

    expect(await source.next(1000)).toEqual({ kind: 'event', event: { type: 'command', command: 'next' } });
    stream.destroy(new Error('disk gone'));
    const poll = await source.next(1000);

    expect(poll.kind).toBe('error');
    const error = poll.kind === 'error' ? poll.error : null;
    expect(error).toBeInstanceOf(InputError);
    expect(error?.message).toBe('Input stream failed: disk gone');
  });
});
