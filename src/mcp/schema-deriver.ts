// This module derives a tool's input schema from its declared parameters and the "MCP Parameters:" section of its documentation.

import type { ToolInputSchema } from '../types/mcp.js';
import { RegistrationError } from '../utils/errors.js';

export const PARAMETER_SECTION_MARKER = 'MCP Parameters:';

// One entry: `name - description`, leading indentation allowed; the description may be empty.
const PARAMETER_LINE = /^\s*([A-Za-z_$][\w$-]*)\s+-(?:\s+(.*))?$/;

export interface DocumentedParameter {
  name: string;
  description: string;
}

// This function extracts documented parameters in order; text outside the trailing section is ignored.
export function parseParameterSection(documentation: string | undefined): DocumentedParameter[] {
  if (!documentation) {
    return [];
  }

  const markerIndex = documentation.lastIndexOf(PARAMETER_SECTION_MARKER);
  if (markerIndex === -1) {
    return [];
  }

  const section = documentation.slice(markerIndex + PARAMETER_SECTION_MARKER.length);
  const entries: DocumentedParameter[] = [];

  for (const line of section.split(/\r?\n/)) {
    if (line.trim() === '') {
      continue;
    }

    const match = PARAMETER_LINE.exec(line);
    if (match) {
      entries.push({ name: match[1], description: (match[2] ?? '').trim() });
      continue;
    }

    // Continuation of the previous entry's description.
    const previous = entries.at(-1);
    if (previous) {
      previous.description = [previous.description, line.trim()].filter(Boolean).join(' ');
    }
  }

  return entries;
}

// This function validates documented entries against the declared parameter list and builds the schema.
export function deriveInputSchema(declaredParameters: readonly string[], documentation?: string): ToolInputSchema {
  if (declaredParameters.length > 1) {
    throw new RegistrationError(
      `Tool handlers take at most one parameter, got ${declaredParameters.length}: ${declaredParameters.join(', ')}`
    );
  }

  const declared = declaredParameters[0];
  const documented = parseParameterSection(documentation);
  const seen = new Set<string>();

  for (const entry of documented) {
    if (seen.has(entry.name)) {
      throw new RegistrationError(`Duplicate parameter '${entry.name}' in ${PARAMETER_SECTION_MARKER} section`);
    }
    seen.add(entry.name);

    if (entry.name !== declared) {
      throw new RegistrationError(`Documented parameter '${entry.name}' does not match the handler signature`);
    }
  }

  if (declared === undefined) {
    return { type: 'object' };
  }

  const entry = documented.find((item) => item.name === declared);
  if (!entry) {
    throw new RegistrationError(`Parameter '${declared}' is not documented in an ${PARAMETER_SECTION_MARKER} section`);
  }

  return {
    type: 'object',
    properties: {
      [declared]: entry.description ? { type: 'string', description: entry.description } : { type: 'string' }
    },
    required: [declared]
  };
}
