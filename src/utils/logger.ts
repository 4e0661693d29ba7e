// This module centralizes structured logging configuration and safe payload shaping.

import { createHash } from 'node:crypto';
import pino, { type Logger, type LoggerOptions } from 'pino';
import { MCP_SERVER_NAME } from '../version.js';

const MAX_LOG_DEPTH = 5;
const MAX_LOG_STRING_LENGTH = 1024;
const MAX_LOG_ARRAY_ITEMS = 30;
const MAX_LOG_OBJECT_KEYS = 30;

// This list ensures that obvious secrets in tool arguments are removed before writing JSON logs.
const REDACT_PATHS = ['*.authorization', '*.cookie', '*.token', '*.password', '*.secret', '*.apiKey'];

// Tool arguments are free-form, so keys are matched by fragment rather than exact name.
const SENSITIVE_KEY_FRAGMENTS = ['token', 'password', 'passphrase', 'authorization', 'cookie', 'secret', 'api_key', 'apikey'];

function isSensitiveKey(key: string): boolean {
  const normalized = key.toLowerCase();
  return SENSITIVE_KEY_FRAGMENTS.some((fragment) => normalized.includes(fragment));
}

function truncateString(value: string): string {
  const overflow = value.length - MAX_LOG_STRING_LENGTH;
  return overflow > 0 ? `${value.slice(0, MAX_LOG_STRING_LENGTH)}...[truncated:${overflow}]` : value;
}

// This helper returns a stable short hash to correlate sensitive values without exposing them.
function shortHash(value: string): string {
  return createHash('sha256').update(value).digest('hex').slice(0, 12);
}

// This helper shapes decoded JSON-RPC params and tool arguments for logs: secrets hashed, sizes bounded.
export function sanitizeForLog(value: unknown, depth = 0): unknown {
  if (typeof value === 'string') {
    return truncateString(value);
  }

  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (depth > MAX_LOG_DEPTH) {
    return '[depth-limited]';
  }

  if (Array.isArray(value)) {
    const truncatedArray = value.slice(0, MAX_LOG_ARRAY_ITEMS).map((item) => sanitizeForLog(item, depth + 1));
    if (value.length > MAX_LOG_ARRAY_ITEMS) {
      truncatedArray.push(`[truncated-items:${value.length - MAX_LOG_ARRAY_ITEMS}]`);
    }
    return truncatedArray;
  }

  const entries = Object.entries(value);
  const target: Record<string, unknown> = {};

  for (const [key, entryValue] of entries.slice(0, MAX_LOG_OBJECT_KEYS)) {
    if (isSensitiveKey(key)) {
      const serialized = typeof entryValue === 'string' ? entryValue : JSON.stringify(entryValue ?? '');
      target[key] = `[redacted:${shortHash(serialized)}]`;
      continue;
    }

    target[key] = sanitizeForLog(entryValue, depth + 1);
  }

  if (entries.length > MAX_LOG_OBJECT_KEYS) {
    target.__truncatedKeys = entries.length - MAX_LOG_OBJECT_KEYS;
  }

  return target;
}

// This helper normalizes unknown errors into a compact, structured shape for logs.
export function errorForLog(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack
    };
  }

  return {
    message: String(error)
  };
}

// This helper builds one logger configuration shared by the dispatcher and the fastify transport.
export function buildLoggerOptions(level = process.env.LOG_LEVEL ?? 'info', service = MCP_SERVER_NAME): LoggerOptions {
  return {
    level,
    base: {
      service
    },
    redact: {
      paths: REDACT_PATHS,
      remove: true
    },
    timestamp: pino.stdTimeFunctions.isoTime
  };
}

// Logs go to stderr because stdout is the wire for stdio transports.
export function createLogger(options: LoggerOptions = buildLoggerOptions()): Logger {
  return pino(options, pino.destination(2));
}
