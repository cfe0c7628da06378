import { appendFileSync } from 'node:fs';
import { LogEntry, LogLevel } from '../types';

export type LogSink = (entry: LogEntry) => void;

let idCounter = 0;
const nextId = () => `${Date.now()}-${idCounter++}`;

/**
 * Logger
 *
 * Builds LogEntry records for one source and fans them out to the
 * registered sinks. Subscribers receive entries synchronously, in order.
 */
export class Logger {
  private sinks: Set<LogSink> = new Set();

  constructor(public readonly source: string, sinks: LogSink[] = []) {
    sinks.forEach(sink => this.sinks.add(sink));
  }

  public subscribe(sink: LogSink): () => void {
    this.sinks.add(sink);
    return () => this.sinks.delete(sink);
  }

  /** Logger for another source sharing this logger's sinks. */
  public child(source: string): Logger {
    return new Logger(source, Array.from(this.sinks));
  }

  public emit(level: LogLevel, message: string): LogEntry {
    const entry: LogEntry = {
      id: nextId(),
      timestamp: new Date().toISOString(),
      source: this.source,
      level,
      message
    };
    this.sinks.forEach(sink => sink(entry));
    return entry;
  }

  public info(message: string) { return this.emit('info', message); }
  public warning(message: string) { return this.emit('warning', message); }
  public error(message: string) { return this.emit('error', message); }
  public debug(message: string) { return this.emit('debug', message); }
  public packet(message: string) { return this.emit('packet', message); }
  public change(message: string) { return this.emit('change', message); }
}

export const formatLogLine = (entry: LogEntry): string =>
  `${entry.timestamp} - ${entry.level.toUpperCase()} - [${entry.source}] ${entry.message}`;

export const createFileSink = (filePath: string): LogSink => (entry) => {
  try {
    appendFileSync(filePath, formatLogLine(entry) + '\n');
  } catch (e) {
    console.error(`Failed to write log file ${filePath}`, e);
  }
};

export const createConsoleSink = (levels: LogLevel[]): LogSink => (entry) => {
  if (!levels.includes(entry.level)) return;
  if (entry.level === 'error') console.error(entry.message);
  else console.log(entry.message);
};
