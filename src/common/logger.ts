import fs from 'fs';
import path from 'path';

export type Level = 'debug' | 'info' | 'warn' | 'error';

export type LogData = Record<string, unknown>;

// stdout carries the MCP protocol, so warnings go to stderr and everything to the ndjson file.
export class NdjsonLogger {
  private stream: fs.WriteStream | null = null;

  constructor(private readonly prefix: string) {}

  line(level: Level, data: LogData) {
    if (level === 'warn' || level === 'error') {
      console.error(`[${this.prefix}] ${level}: ${describe(data)}`);
    }
    const rec = { t: new Date().toISOString(), level, data };
    this.open()?.write(JSON.stringify(rec) + '\n');
  }

  info(event: string, data: LogData = {}) {
    this.line('info', { event, ...data });
  }

  warn(event: string, data: LogData = {}) {
    this.line('warn', { event, ...data });
  }

  error(event: string, data: LogData = {}) {
    this.line('error', { event, ...data });
  }

  private open(): fs.WriteStream | null {
    if (this.stream) return this.stream;

    const dir = process.env.LOG_DIR ?? 'logs';
    if (dir === 'off' || dir === '') return null;

    const logsDir = path.resolve(process.cwd(), dir);
    fs.mkdirSync(logsDir, { recursive: true });
    const ts = new Date().toISOString().replace(/[:.]/g, '-');
    this.stream = fs.createWriteStream(path.join(logsDir, `${this.prefix}-${ts}.ndjson`), { flags: 'a' });
    return this.stream;
  }
}

function describe(data: LogData): string {
  const { event, message, ...rest } = data;
  const head = [event, message].filter((v) => v !== undefined).join(': ');
  const tail = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
  return head + tail;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
