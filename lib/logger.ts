/**
 * Process-wide pino logger.
 *
 * Logs are JSON lines on stderr until `redirectLogs()` points them at a file;
 * stdout is reserved for enrichment results.
 */
import fs from 'fs';
import pino, { type Logger } from 'pino';
import { CONFIG } from './config';

interface SwitchableDestination {
  target: NodeJS.WritableStream;
  write(msg: string): void;
}

const destination: SwitchableDestination = {
  target: process.stderr,
  write(msg: string) {
    this.target.write(msg);
  },
};

function serializeError(err: unknown): unknown {
  if (!(err instanceof Error)) return err;
  return {
    type: err.name,
    kind: 'kind' in err ? err.kind : undefined,
    message: err.message,
    stack: err.stack,
    cause: err.cause instanceof Error ? err.cause.message : err.cause,
  };
}

export const logger: Logger = pino(
  {
    level: CONFIG.LOG_LEVEL,
    base: { name: 'origin-intel' },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: { err: serializeError },
  },
  destination,
);

let fileStream: fs.WriteStream | null = null;

/** Append all further log lines to `file` instead of stderr. */
export function redirectLogs(file: string): void {
  const next = fs.createWriteStream(file, { flags: 'a' });
  const prev = fileStream;
  fileStream = next;
  destination.target = next;
  prev?.end();
}

/** Flush and close the log file, if any. */
export async function flushLogs(): Promise<void> {
  const stream = fileStream;
  if (!stream) return;
  fileStream = null;
  destination.target = process.stderr;
  await new Promise<void>((resolve) => stream.end(resolve));
}

export default logger;
