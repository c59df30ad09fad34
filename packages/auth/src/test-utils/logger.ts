import { createLogger, type LogEntry, type LogTransport, type Logger } from '@vouch/core';

export class CaptureTransport implements LogTransport {
  readonly name = 'capture';
  entries: LogEntry[] = [];

  log(entry: LogEntry): void {
    this.entries.push(entry);
  }
}

export function captureLogger(): { logger: Logger; transport: CaptureTransport } {
  const transport = new CaptureTransport();
  const logger = createLogger({ level: 'TRACE', transports: [transport], timestamp: () => 't' });
  return { logger, transport };
}
