export type LogKind = "info" | "warning" | "error" | "command" | "output";

export interface LogEntry {
  readonly kind: LogKind;
  readonly message: string;
  readonly timestamp: Date;
}

const pad = (n: number, width = 2): string => String(n).padStart(width, "0");

/** HH:mm:ss.SSS in local time */
export const formatTimestamp = (date: Date): string =>
  `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.${pad(date.getMilliseconds(), 3)}`;

export const commandLine = (path: string, args: ReadonlyArray<string>): string =>
  [path, ...args].join(" ");
