import pino, { type Logger, type LevelWithSilent, type StreamEntry } from "pino";

export type { Logger } from "pino";

/** Console-only logger used before the configuration (and its log file) is known. */
export const logger = pino({ name: "provision", level: process.env.LOG_LEVEL ?? "info" }, pino.destination(2));

export interface LoggerOptions {
  level: LevelWithSilent;
  /** Run log file; every line written to the console is appended here too. */
  file?: string | null;
}

/** Logger for one provisioning run: stderr plus, optionally, the persisted run log. */
export function createLogger(options: LoggerOptions): Logger {
  if (options.level === "silent") return pino({ name: "provision", level: "silent" });

  const level = options.level;
  const streams: StreamEntry[] = [{ level, stream: pino.destination(2) }];
  if (options.file) {
    streams.push({ level, stream: pino.destination({ dest: options.file, sync: true, mkdir: true, append: true }) });
  }
  return pino({ name: "provision", level }, pino.multistream(streams));
}
