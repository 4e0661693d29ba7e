// This test suite verifies handler invocation outcomes and the tool error guard.

import { describe, expect, it } from 'vitest';
import { guardToolErrors, invokeTool, nullaryHandler, toToolCallResult, unaryHandler } from '../src/mcp/tools.js';
import { ToolError } from '../src/utils/errors.js';
import { silentLogger } from './helpers.js';

describe('invokeTool', () => {
  it('returns ok outcomes with the handler text', async () => {
    const handler = unaryHandler('name', (name) => `hello ${name}`);
    await expect(invokeTool('greet', handler, 'ada', silentLogger)).resolves.toEqual({ kind: 'ok', text: 'hello ada' });
  });

  it('returns tool_error outcomes for ToolError', async () => {
    const handler = nullaryHandler(() => {
      throw new ToolError('quota exceeded');
    });
    await expect(invokeTool('limited', handler, undefined, silentLogger)).resolves.toEqual({
      kind: 'tool_error',
      message: 'quota exceeded'
    });
  });

  it('propagates other failures', async () => {
    const handler = nullaryHandler(() => {
      throw new RangeError('out of range');
    });
    await expect(invokeTool('broken', handler, undefined, silentLogger)).rejects.toBeInstanceOf(RangeError);
  });
});

describe('guardToolErrors', () => {
  it('turns generic failures into tool errors', async () => {
    const guarded = guardToolErrors((path: string) => {
      throw new Error(`cannot read ${path}`);
    });

    await expect(guarded('notes.txt')).rejects.toBeInstanceOf(ToolError);
    await expect(guarded('notes.txt')).rejects.toThrow('cannot read notes.txt');
  });

  it('passes results and tool errors through', async () => {
    const original = new ToolError('already reported');
    await expect(guardToolErrors(() => 'fine')()).resolves.toBe('fine');
    await expect(
      guardToolErrors(() => {
        throw original;
      })()
    ).rejects.toBe(original);
  });

  it('lets a guarded handler report failures as tool results', async () => {
    const handler = nullaryHandler(
      guardToolErrors(() => {
        throw new Error('network unreachable');
      })
    );
    const outcome = await invokeTool('fetch', handler, undefined, silentLogger);

    expect(toToolCallResult(outcome)).toEqual({
      content: [{ type: 'text', text: 'network unreachable' }],
      isError: true
    });
  });
});
