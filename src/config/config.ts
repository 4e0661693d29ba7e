// This module reads runtime settings from the environment and validates them before the server is built.

import { z } from 'zod';
import { AppError } from '../utils/errors.js';
import { MCP_SERVER_NAME, MCP_SERVER_VERSION } from '../version.js';

// This helper accepts the usual spellings of an on/off environment flag.
const booleanFlagSchema = z
  .enum(['1', '0', 'true', 'false', 'yes', 'no', 'on', 'off'])
  .transform((value) => ['1', 'true', 'yes', 'on'].includes(value));

const envSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  MCP_TRACE_IO: booleanFlagSchema.default('false'),
  MCP_SERVER_NAME: z.string().trim().min(1).default(MCP_SERVER_NAME),
  MCP_SERVER_VERSION: z.string().trim().min(1).default(MCP_SERVER_VERSION),
  HOST: z.string().trim().min(1).default('127.0.0.1'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080)
});

export interface RuntimeConfig {
  logLevel: string;
  traceIo: boolean;
  serverName: string;
  serverVersion: string;
  host: string;
  port: number;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): RuntimeConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new AppError('config_invalid', 'Environment configuration is invalid.', parsed.error.flatten().fieldErrors);
  }

  return {
    logLevel: parsed.data.LOG_LEVEL,
    traceIo: parsed.data.MCP_TRACE_IO,
    serverName: parsed.data.MCP_SERVER_NAME,
    serverVersion: parsed.data.MCP_SERVER_VERSION,
    host: parsed.data.HOST,
    port: parsed.data.PORT
  };
}
