import { describe, expect, it } from 'vitest';
import { withAsyncBlock, withBlock } from './blockDecorator.js';
import { createMemoryOutput } from './test/index.js';

describe('withBlock', () => {
  it('forwards arguments and returns the wrapped result', () => {
    const output = createMemoryOutput();
    const add = withBlock(['step'], { output, width: 10 })((a: number, b: number) => a + b);

    expect(add(2, 3)).toBe(5);
    expect(output.lines()).toEqual(['|  step  |', '|--------|', '', '|success |', '|--------|']);
  });

  it('draws the block on every call', () => {
    const output = createMemoryOutput();
    const noop = withBlock(['step'], { output, width: 10 })(() => undefined);

    noop();
    noop();

    expect(output.lines()).toHaveLength(10);
  });

  it('keeps the receiver', () => {
    const output = createMemoryOutput();
    const scaler = {
      factor: 3,
      scale: withBlock(['scale'], { output, width: 12 })(function (this: { factor: number }, value: number) {
        return value * this.factor;
      }),
    };

    expect(scaler.scale(2)).toBe(6);
  });

  it('uses the requested variant', () => {
    const output = createMemoryOutput();
    const start = withBlock(['Start'], { output, width: 11, variant: 'header' })(() => 'started');

    expect(start()).toBe('started');
    expect(output.lines()).toEqual(['+---------+', '|  Start  |', '+---------+']);
  });

  it('keeps the wrapped function name and arity', () => {
    const output = createMemoryOutput();
    const add = withBlock(['step'], { output, width: 10 })(function add(a: number, b: number) {
      return a + b;
    });

    expect(add.name).toBe('add');
    expect(add.length).toBe(2);
  });

  it('propagates errors from the wrapped function', () => {
    const output = createMemoryOutput();
    const fail = withBlock(['step'], { output, width: 10 })(() => {
      throw new Error('wrapped failure');
    });

    expect(() => fail()).toThrow('wrapped failure');
    expect(output.lines()).toEqual(['|  step  |', '|--------|']);
  });
});

describe('withAsyncBlock', () => {
  it('draws the success mark after the promise resolves', async () => {
    const output = createMemoryOutput();
    const fetchCount = withAsyncBlock(['fetch'], { output, width: 11 })(async (base: number) => {
      output.write('WORK\n');
      return base + 1;
    });

    await expect(fetchCount(1)).resolves.toBe(2);
    expect(output.lines()).toEqual(['|  fetch  |', '|---------|', 'WORK', '', '| success |', '|---------|']);
  });

  it('keeps the wrapped function name and arity', () => {
    const output = createMemoryOutput();
    const load = withAsyncBlock(['load'], { output, width: 10 })(async function load(id: string) {
      return id;
    });

    expect(load.name).toBe('load');
    expect(load.length).toBe(1);
  });
});
