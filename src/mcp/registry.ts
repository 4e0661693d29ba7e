// This module owns tool registrations for one server instance.

import { z } from 'zod';
import type { McpTool, ToolAnnotations, ToolInputSchema } from '../types/mcp.js';
import { RegistrationError } from '../utils/errors.js';
import { deriveInputSchema } from './schema-deriver.js';
import { declaredParameters, type ToolHandler } from './tools.js';

const handlerSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('nullary'),
    run: z.function(),
    documentation: z.string().optional()
  }),
  z.object({
    kind: z.literal('unary'),
    parameter: z.string().min(1, 'parameter name must not be empty'),
    run: z.function(),
    documentation: z.string().optional()
  })
]);

const registrationSchema = z.object({
  id: z.string({ required_error: 'id is required' }).min(1, 'id must not be empty'),
  description: z.string({ required_error: 'description is required' }),
  handler: handlerSchema,
  title: z.string().optional(),
  readOnly: z.boolean().optional()
});

export interface ToolRegistrationInput {
  id: string;
  description: string;
  handler: ToolHandler;
  title?: string;
  readOnly?: boolean;
}

export interface ToolRegistration {
  readonly id: string;
  readonly description: string;
  readonly inputSchema: Readonly<ToolInputSchema>;
  readonly handler: ToolHandler;
  readonly title?: string;
  readonly readOnly?: boolean;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

// This helper renders one registration as a tools/list entry; annotations appear only when something was set.
export function describeTool(registration: ToolRegistration): McpTool {
  const annotations: ToolAnnotations = {};
  if (registration.title !== undefined) {
    annotations.title = registration.title;
  }
  if (registration.readOnly !== undefined) {
    annotations.readOnlyHint = registration.readOnly;
  }

  const tool: McpTool = {
    name: registration.id,
    description: registration.description,
    inputSchema: registration.inputSchema
  };
  if (Object.keys(annotations).length > 0) {
    tool.annotations = annotations;
  }
  return tool;
}

export class ToolRegistry {
  private readonly tools = new Map<string, ToolRegistration>();

  // Re-registering an id replaces the previous registration.
  public register(input: ToolRegistrationInput): ToolRegistration {
    const parsed = registrationSchema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`);
      throw new RegistrationError(`Invalid tool registration: ${issues.join('; ')}`, parsed.error.flatten());
    }

    const inputSchema = deepFreeze(deriveInputSchema(declaredParameters(input.handler), input.handler.documentation));

    const registration: ToolRegistration = Object.freeze({
      id: input.id,
      description: input.description,
      inputSchema,
      handler: input.handler,
      ...(input.title !== undefined ? { title: input.title } : {}),
      ...(input.readOnly !== undefined ? { readOnly: input.readOnly } : {})
    });

    this.tools.set(registration.id, registration);
    return registration;
  }

  public unregister(id: string): boolean {
    return this.tools.delete(id);
  }

  public lookup(id: string): ToolRegistration | undefined {
    return this.tools.get(id);
  }

  public list(): ToolRegistration[] {
    return [...this.tools.values()];
  }

  public get size(): number {
    return this.tools.size;
  }
}
