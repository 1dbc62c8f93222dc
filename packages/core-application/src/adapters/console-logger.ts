import fs from "node:fs";
import path from "node:path";

import { LOG_LEVEL_ORDER, type Logger, type LogLevel } from "../ports/logger";

export type ConsoleLoggerOptions = {
  level?: LogLevel;
  /** Se definido, cada linha também é anexada a este arquivo. */
  logFile?: string;
  now?: () => Date;
};

const pad = (n: number) => String(n).padStart(2, "0");

export function formatTimestamp(d: Date): string {
  return (
    `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
    `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
  );
}

export function formatLogLine(at: Date, level: LogLevel, message: string): string {
  const label = level === "warn" ? "WARNING" : level.toUpperCase();
  return `${formatTimestamp(at)} - ${label} - ${message}`;
}

export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private logFile?: string;
  private readonly now: () => Date;

  constructor(opts: ConsoleLoggerOptions = {}) {
    this.level = opts.level ?? "info";
    this.now = opts.now ?? (() => new Date());

    if (opts.logFile) {
      this.logFile = path.resolve(opts.logFile);
      fs.mkdirSync(path.dirname(this.logFile), { recursive: true });
    }
  }

  private write(level: LogLevel, message: string): void {
    if (LOG_LEVEL_ORDER[level] < LOG_LEVEL_ORDER[this.level]) return;

    const line = formatLogLine(this.now(), level, message);
    switch (level) {
      case "debug":
        console.debug(line);
        break;
      case "info":
        console.info(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(line);
        break;
    }

    // append síncrono: mantém a ordem das linhas sem promises soltas
    if (this.logFile) this.appendToFile(this.logFile, line);
  }

  /** Uma falha no arquivo não interrompe a execução: avisa uma vez e segue só no console. */
  private appendToFile(file: string, line: string): void {
    try {
      fs.appendFileSync(file, line + "\n", "utf-8");
    } catch (err) {
      this.logFile = undefined;
      const reason = err instanceof Error ? err.message : String(err);
      console.error(formatLogLine(this.now(), "error", `Could not write to log file ${file}, logging to the console only: ${reason}`));
    }
  }

  debug(message: string): void {
    this.write("debug", message);
  }

  info(message: string): void {
    this.write("info", message);
  }

  warn(message: string): void {
    this.write("warn", message);
  }

  error(message: string): void {
    this.write("error", message);
  }
}
