import { describe, it, expect } from 'vitest';
import { PassThrough } from 'node:stream';
import { OperatorConsole } from '../cli/console';

function setup(): { input: PassThrough; output: PassThrough; operator: OperatorConsole; written: () => string } {
  const input = new PassThrough();
  const output = new PassThrough();
  const chunks: string[] = [];
  output.on('data', (chunk: Buffer) => chunks.push(chunk.toString()));
  return { input, output, operator: new OperatorConsole({ input, output }), written: () => chunks.join('') };
}

describe('OperatorConsole', () => {
  it('returns the entered line', async () => {
    const { input, operator } = setup();
    const pending = operator.read('> ', new AbortController().signal);
    input.write('fix the typo\n');
    expect(await pending).toBe('fix the typo');
    operator.close();
  });

  it('returns null when the read is cancelled', async () => {
    const { operator } = setup();
    const controller = new AbortController();
    const pending = operator.read('> ', controller.signal);
    controller.abort();
    expect(await pending).toBeNull();
    operator.close();
  });

  it('returns null once input ends', async () => {
    const { input, operator } = setup();
    const pending = operator.read('> ', new AbortController().signal);
    input.end();
    expect(await pending).toBeNull();
    expect(await operator.read('> ', new AbortController().signal)).toBeNull();
  });

  it('writes one line per message', async () => {
    const { operator, written } = setup();
    operator.write('Task Completed: done');
    await new Promise(resolve => setImmediate(resolve));
    expect(written()).toBe('Task Completed: done\n');
    operator.close();
  });
});
