import { describe, it, expect } from 'vitest';
import { PassThrough } from 'stream';
import { applyErasures, ReadlineSource, ScriptedSource } from './Input';
import { InterruptError } from '../utils/errors';

/**
 * Stream standing in for a terminal's stdin
 */
class FakeTty extends PassThrough {
  readonly isTTY = true;
  readonly rawModes: boolean[] = [];

  setRawMode(mode: boolean): this {
    this.rawModes.push(mode);
    return this;
  }
}

describe('ReadlineSource', () => {
  it('should resolve with lines in order, without terminators', async () => {
    const stream = new PassThrough();
    const source = new ReadlineSource(stream);

    const first = source.readLine();
    stream.write('hello\r\nworld\n');

    await expect(first).resolves.toBe('hello');
    await expect(source.readLine()).resolves.toBe('world');
    source.close();
  });

  it('should reject pending reads when the input ends', async () => {
    const stream = new PassThrough();
    const source = new ReadlineSource(stream);

    const pending = source.readLine();
    stream.end();

    await expect(pending).rejects.toBeInstanceOf(InterruptError);
    await expect(source.readLine()).rejects.toBeInstanceOf(InterruptError);
  });

  it('should reject reads after close without touching the stream', async () => {
    const source = new ReadlineSource(new PassThrough());
    source.close();
    await expect(source.readLine()).rejects.toThrow('Input closed by operator');
  });
});

describe('masked reads', () => {
  it('should read a terminal line in raw mode and apply erasures', async () => {
    const tty = new FakeTty();
    const source = new ReadlineSource(tty);

    const pending = source.readLine({ mask: true });
    expect(tty.rawModes).toEqual([true]);
    tty.write('se\x7fecret\r');

    await expect(pending).resolves.toBe('secret');
    expect(tty.rawModes).toEqual([true, false]);
    source.close();
  });

  it('should turn Ctrl+C into an interrupt and leave raw mode', async () => {
    const tty = new FakeTty();
    const source = new ReadlineSource(tty);

    const pending = source.readLine({ mask: true });
    tty.write('abc\x03');

    await expect(pending).rejects.toBeInstanceOf(InterruptError);
    expect(tty.rawModes).toEqual([true, false]);
  });

  it('should read piped input as usual', async () => {
    const stream = new PassThrough();
    const source = new ReadlineSource(stream);

    const pending = source.readLine({ mask: true });
    stream.write('plain\n');

    await expect(pending).resolves.toBe('plain');
    source.close();
  });

  it('should drop one character per erase key', () => {
    expect(applyErasures('ab\b\bc')).toBe('c');
    expect(applyErasures('\x7fx')).toBe('x');
  });
});

describe('ScriptedSource', () => {
  it('should hand out answers in order and count reads', async () => {
    const source = new ScriptedSource(['a', 'b']);

    await expect(source.readLine()).resolves.toBe('a');
    expect(source.reads).toBe(1);
    expect(source.remaining).toBe(1);
    await expect(source.readLine({ mask: true })).resolves.toBe('b');
    expect(source.reads).toBe(2);
    expect(source.maskedReads).toBe(1);
  });

  it('should report the input as closed once exhausted', async () => {
    const source = new ScriptedSource([]);
    await expect(source.readLine()).rejects.toThrow('Scripted input exhausted');
    expect(source.reads).toBe(0);
  });

  it('should stop answering after close', async () => {
    const source = new ScriptedSource(['a']);
    source.close();
    await expect(source.readLine()).rejects.toBeInstanceOf(InterruptError);
    expect(source.remaining).toBe(1);
  });
});
