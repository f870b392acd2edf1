/**
 * Scraper Logger - structured logging with levels, colors, and file output
 */

import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

interface LogEntry {
  timestamp: string;
  level: string;
  component: string;
  message: string;
  data?: unknown;
}

type PrintableLevel = Exclude<LogLevel, LogLevel.SILENT>;

const LEVEL_COLORS: Record<PrintableLevel, (text: string) => string> = {
  [LogLevel.DEBUG]: chalk.dim,
  [LogLevel.INFO]: chalk.green,
  [LogLevel.WARN]: chalk.yellow,
  [LogLevel.ERROR]: chalk.red,
};

const LEVEL_NAMES: Record<PrintableLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
};

export class Logger {
  private minLevel: LogLevel = LogLevel.INFO;
  private logDir: string;
  private logFile: string | null = null;
  private logBuffer: LogEntry[] = [];

  constructor(logDir: string = path.join(process.cwd(), 'logs')) {
    this.logDir = logDir;
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  get sessionFile(): string | null {
    return this.logFile;
  }

  /**
   * Start a new log session with timestamped file
   */
  startSession(name: string = 'scrape'): string {
    if (!fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    this.logFile = path.join(this.logDir, `${name}-${timestamp}.log`);
    this.logBuffer = [];
    this.info('Logger', `Session started: ${this.logFile}`);
    return this.logFile;
  }

  private formatTime(): string {
    return new Date().toISOString().substring(11, 23); // HH:MM:SS.mmm
  }

  private log(level: PrintableLevel, component: string, message: string, data?: unknown) {
    if (level < this.minLevel) return;

    const timestamp = this.formatTime();
    const levelName = LEVEL_NAMES[level];
    const color = LEVEL_COLORS[level];

    const prefix = `${chalk.dim(timestamp)} ${color(levelName.padEnd(5))}`;
    console.log(`${prefix} ${chalk.cyan(`[${component}]`)} ${message}`);

    if (data !== undefined && this.minLevel === LogLevel.DEBUG) {
      console.log(chalk.dim(`  └─ ${JSON.stringify(data, null, 2).split('\n').join('\n     ')}`));
    }

    // Only buffered while a session file is open
    if (this.logFile) {
      this.logBuffer.push({ timestamp, level: levelName, component, message, data });
    }
  }

  debug(component: string, message: string, data?: unknown) {
    this.log(LogLevel.DEBUG, component, message, data);
  }

  info(component: string, message: string, data?: unknown) {
    this.log(LogLevel.INFO, component, message, data);
  }

  warn(component: string, message: string, data?: unknown) {
    this.log(LogLevel.WARN, component, message, data);
  }

  error(component: string, message: string, data?: unknown) {
    this.log(LogLevel.ERROR, component, message, data);
  }

  /**
   * Log progress for batch operations
   */
  progress(component: string, current: number, total: number, item: string, extra?: string) {
    if (this.minLevel > LogLevel.INFO) return;
    const pct = total > 0 ? Math.round((current / total) * 100) : 100;
    const filled = Math.floor(pct / 5);
    const bar = '█'.repeat(filled) + '░'.repeat(20 - filled);
    const extraStr = extra ? ` ${chalk.dim(`(${extra})`)}` : '';
    console.log(`${chalk.dim(this.formatTime())} ${chalk.blue(bar)} ${chalk.cyan(`[${component}]`)} ${current}/${total} ${item}${extraStr}`);
  }

  /**
   * Log a summary table
   */
  summary(title: string, data: Record<string, number | string>) {
    if (this.minLevel <= LogLevel.INFO) this.printSummary(title, data);

    if (this.logFile) {
      this.logBuffer.push({
        timestamp: this.formatTime(),
        level: 'INFO',
        component: 'Summary',
        message: title,
        data,
      });
    }
  }

  private printSummary(title: string, data: Record<string, number | string>) {
    console.log(`\n${chalk.cyan(`╭${'─'.repeat(48)}╮`)}`);
    console.log(`${chalk.cyan('│')} ${chalk.green(title.padEnd(47))}${chalk.cyan('│')}`);
    console.log(chalk.cyan(`├${'─'.repeat(48)}┤`));

    for (const [key, value] of Object.entries(data)) {
      const valueStr = typeof value === 'number' ? value.toLocaleString() : value;
      console.log(`${chalk.cyan('│')}  ${key.padEnd(25)} ${String(valueStr).padStart(20)} ${chalk.cyan('│')}`);
    }

    console.log(`${chalk.cyan(`╰${'─'.repeat(48)}╯`)}\n`);
  }

  /**
   * Flush log buffer to file
   */
  flush() {
    if (this.logFile && this.logBuffer.length > 0) {
      const content = this.logBuffer.map(entry =>
        `${entry.timestamp} [${entry.level}] [${entry.component}] ${entry.message}${entry.data !== undefined ? ' ' + JSON.stringify(entry.data) : ''}`
      ).join('\n');
      fs.appendFileSync(this.logFile, content + '\n');
      this.logBuffer = [];
    }
  }
}

// Singleton instance
export const logger = new Logger();
