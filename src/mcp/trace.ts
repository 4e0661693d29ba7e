// This module records raw inbound and outbound protocol messages when I/O tracing is on.

import type { Logger } from 'pino';

export type TraceDirection = 'in' | 'out';

export interface TraceSink {
  record(direction: TraceDirection, message: string): void;
}

export function createLoggerTraceSink(logger: Logger): TraceSink {
  return {
    record(direction, message) {
      logger.debug({ event: 'mcp_io', direction, message }, 'mcp_io');
    }
  };
}

// Keeps a readable transcript: `-> ` for inbound, `<- ` for outbound.
export class MemoryTraceSink implements TraceSink {
  private readonly lines: string[] = [];

  public record(direction: TraceDirection, message: string): void {
    this.lines.push(`${direction === 'in' ? '->' : '<-'} ${message}`);
  }

  public transcript(): readonly string[] {
    return this.lines;
  }

  public clear(): void {
    this.lines.length = 0;
  }
}
