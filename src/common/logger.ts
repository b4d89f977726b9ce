import fs from 'fs';
import path from 'path';

export interface LogField {
  key: string;
  value: unknown;
}

export function field(key: string, value: unknown): LogField {
  return { key, value };
}

/**
 * Logging capability handed to the client. Fields are ordered key/value pairs
 * attached to the message.
 */
export interface Logger {
  debug(msg: string, ...fields: LogField[]): void;
  info(msg: string, ...fields: LogField[]): void;
}

export class NoopLogger implements Logger {
  debug(_msg: string, ..._fields: LogField[]): void {}
  info(_msg: string, ..._fields: LogField[]): void {}
}

export type Level = 'debug' | 'info';

export interface NdjsonLoggerOptions {
  dir?: string;
  minLevel?: Level;
}

const LEVEL_RANK: Record<Level, number> = { debug: 0, info: 1 };

/**
 * Appends one JSON record per call to logs/<prefix>-<timestamp>.ndjson.
 */
export class NdjsonLogger implements Logger {
  private stream: fs.WriteStream | null = null;
  private filePath: string;
  private minLevel: Level;

  constructor(prefix: string, options: NdjsonLoggerOptions = {}) {
    const logsDir = options.dir ?? path.resolve(process.cwd(), 'logs');
    fs.mkdirSync(logsDir, { recursive: true });
    const ts = new Date().toISOString().replace(/[:.]/g, '-');
    this.filePath = path.join(logsDir, `${prefix}-${ts}.ndjson`);
    this.stream = fs.createWriteStream(this.filePath, { flags: 'a' });
    this.minLevel = options.minLevel ?? 'debug';
  }

  debug(msg: string, ...fields: LogField[]): void {
    this.line('debug', msg, fields);
  }

  info(msg: string, ...fields: LogField[]): void {
    this.line('info', msg, fields);
  }

  close(): Promise<void> {
    return new Promise((resolve) => {
      if (!this.stream) return resolve();
      this.stream.end(() => resolve());
      this.stream = null;
    });
  }

  get path() {
    return this.filePath;
  }

  private line(level: Level, msg: string, fields: LogField[]) {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.minLevel]) return;
    const data: Record<string, unknown> = {};
    for (const f of fields) data[f.key] = f.value;
    const rec = { t: new Date().toISOString(), level, msg, fields: data };
    this.stream?.write(JSON.stringify(rec) + '\n');
  }
}
