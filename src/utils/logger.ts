import pino, { type Logger } from 'pino';
import dayjs from 'dayjs';
import fs from 'fs';
import path from 'path';

export type { Logger };

export type LogLine = { level: 'info' | 'warn' | 'error'; msg: string; time: string };

/** Últimas linhas de log em memória, servidas pelo painel HTTP. Também serve de destino do pino. */
export class MemoryLog {
  private lines: LogLine[] = [];

  push(level: LogLine['level'], msg: string, time = new Date().toISOString()) {
    this.lines.push({ level, msg, time });
    if (this.lines.length > 3000) this.lines.shift();
  }

  write(chunk: string) {
    try {
      const entry: { level?: number; msg?: string; time?: number } = JSON.parse(chunk);
      const level = (entry.level ?? 30) >= 50 ? 'error' : (entry.level ?? 30) >= 40 ? 'warn' : 'info';
      this.push(level, entry.msg ?? '', entry.time ? new Date(entry.time).toISOString() : undefined);
    } catch {
      this.push('info', chunk.trim());
    }
  }

  list(lastN = 200) { return this.lines.slice(-lastN); }
  clear() { this.lines = []; }
}

export const memlog = new MemoryLog();

export const silentLogger: Logger = pino({ level: 'silent' });

export type LoggerOptions = {
  level: pino.LevelWithSilent;
  logsDir?: string | null;
  console?: boolean;
  memory?: MemoryLog;
};

/**
 * Chamado pelo ponto de entrada (CLI/servidor). Grava em `logs/run-YYYYMMDD-HHmmss.log`,
 * na memória e, opcionalmente, no stdout.
 */
export function createLogger(opts: LoggerOptions): { logger: Logger; logfile: string | null } {
  const level: pino.Level = opts.level === 'silent' ? 'fatal' : opts.level;
  const streams: pino.StreamEntry[] = [{ level, stream: opts.memory ?? memlog }];

  let logfile: string | null = null;
  if (opts.logsDir) {
    fs.mkdirSync(opts.logsDir, { recursive: true });
    logfile = path.join(opts.logsDir, `run-${dayjs().format('YYYYMMDD-HHmmss')}.log`);
    streams.push({ level, stream: pino.destination({ dest: logfile, sync: false }) });
  }
  if (opts.console !== false) streams.push({ level, stream: process.stdout });

  const logger = pino({ level: opts.level }, pino.multistream(streams));
  return { logger, logfile };
}
