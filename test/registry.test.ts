// This test suite verifies tool registration rules, replacement, removal, and listing metadata.

import { describe, expect, it } from 'vitest';
import { ToolRegistry, describeTool, type ToolRegistrationInput } from '../src/mcp/registry.js';
import { nullaryHandler, unaryHandler } from '../src/mcp/tools.js';
import { RegistrationError } from '../src/utils/errors.js';
import { echoHandler } from './helpers.js';

// Simulates a caller that bypasses the compile-time contract.
function untyped(input: Record<string, unknown>): ToolRegistrationInput {
  return input as unknown as ToolRegistrationInput;
}

describe('ToolRegistry', () => {
  it('registers a zero-parameter tool with the empty object schema', () => {
    const registry = new ToolRegistry();
    const registration = registry.register({
      id: 'now',
      description: 'Current time',
      handler: nullaryHandler(() => '12:00')
    });

    expect(registration.inputSchema).toEqual({ type: 'object' });
    expect(Object.isFrozen(registration.inputSchema)).toBe(true);
    expect(registry.lookup('now')).toBe(registration);
    expect(registry.size).toBe(1);
  });

  it('rejects a one-parameter handler without a parameter section', () => {
    const registry = new ToolRegistry();
    expect(() =>
      registry.register({
        id: 'echo',
        description: 'Echoes input',
        handler: unaryHandler('text', (text) => text, 'Echo the text.')
      })
    ).toThrow(RegistrationError);
    expect(registry.lookup('echo')).toBeUndefined();
  });

  it('rejects empty ids, missing descriptions, and non-callable handlers', () => {
    const registry = new ToolRegistry();

    expect(() => registry.register({ id: '', description: 'x', handler: nullaryHandler(() => 'x') })).toThrow(
      'Invalid tool registration: id: id must not be empty'
    );
    expect(() => registry.register(untyped({ id: 'a', handler: nullaryHandler(() => 'x') }))).toThrow(
      'Invalid tool registration: description: description is required'
    );
    expect(() =>
      registry.register(untyped({ id: 'a', description: 'x', handler: { kind: 'nullary', run: 'nope' } }))
    ).toThrow(/handler\.run/);
    expect(registry.size).toBe(0);
  });

  it('replaces a registration under the same id', () => {
    const registry = new ToolRegistry();
    registry.register({ id: 'echo', description: 'First', handler: echoHandler });
    registry.register({ id: 'echo', description: 'Second', handler: echoHandler });

    expect(registry.size).toBe(1);
    expect(registry.lookup('echo')?.description).toBe('Second');
  });

  it('reports whether unregister removed anything', () => {
    const registry = new ToolRegistry();
    registry.register({ id: 'echo', description: 'Echoes input', handler: echoHandler });

    expect(registry.unregister('echo')).toBe(true);
    expect(registry.unregister('echo')).toBe(false);
    expect(registry.list()).toEqual([]);
  });
});

describe('describeTool', () => {
  const registry = new ToolRegistry();

  it('includes title and readOnlyHint when set', () => {
    const registration = registry.register({
      id: 'echo',
      description: 'Echoes input',
      handler: echoHandler,
      title: 'X',
      readOnly: true
    });

    expect(describeTool(registration)).toEqual({
      name: 'echo',
      description: 'Echoes input',
      inputSchema: {
        type: 'object',
        properties: { text: { type: 'string', description: 'The text to echo back' } },
        required: ['text']
      },
      annotations: { title: 'X', readOnlyHint: true }
    });
  });

  it('keeps an explicit false read-only flag', () => {
    const registration = registry.register({
      id: 'wipe',
      description: 'Clears the scratch buffer',
      handler: nullaryHandler(() => 'cleared'),
      readOnly: false
    });

    expect(describeTool(registration).annotations).toEqual({ readOnlyHint: false });
  });

  it('omits annotations when nothing was set', () => {
    const registration = registry.register({
      id: 'now',
      description: 'Current time',
      handler: nullaryHandler(() => '12:00')
    });

    expect('annotations' in describeTool(registration)).toBe(false);
  });
});
