import fs from 'fs';
import path from 'path';

export interface Logger {
  log: (msg: unknown) => void;
}

export function logPath(dataDir: string) {
  return path.join(dataDir, 'server.log');
}

/**
 * Creates the data directory if needed and empties the log file.
 */
export function initializeLog(dataDir: string) {
  fs.mkdirSync(dataDir, { recursive: true });
  return fs.writeFileSync(logPath(dataDir), '', 'utf-8');
}

export function formatLogLine(msg: unknown, now: Date = new Date()) {
  const str =
    typeof msg === 'string'
      ? msg
      : msg instanceof Error
        ? (msg.stack ?? msg.message)
        : JSON.stringify(msg);
  return `[${now.toISOString()}] ${str}\n`;
}

export function log(dataDir: string, msg: unknown) {
  fs.appendFileSync(logPath(dataDir), formatLogLine(msg));
}

/**
 * Creates a logger that appends to the data directory's log file.
 * stdout carries the MCP protocol, so `echo` mirrors lines to stderr only.
 */
export function createFileLogger(
  dataDir: string,
  options?: { echo?: boolean }
): Logger {
  return {
    log: (msg: unknown) => {
      const line = formatLogLine(msg);
      fs.appendFileSync(logPath(dataDir), line);
      if (options?.echo) {
        process.stderr.write(line);
      }
    }
  };
}
