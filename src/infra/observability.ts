export type LoggerLike = {
  info: (obj: unknown, msg?: string) => void;
  debug: (obj: unknown, msg?: string) => void;
  warn: (obj: unknown, msg?: string) => void;
  error: (obj: unknown, msg?: string) => void;
  child?: (bindings: Record<string, unknown>) => LoggerLike;
};

function two(n: number): string {
  return String(n).padStart(2, "0");
}

function formatTimestamp(d: Date): string {
  // Local time, human readable: YYYY-MM-DD HH:mm:ss
  return `${d.getFullYear()}-${two(d.getMonth() + 1)}-${two(d.getDate())} ${two(
    d.getHours(),
  )}:${two(d.getMinutes())}:${two(d.getSeconds())}`;
}

type ConsoleLevel = "info" | "debug" | "warn" | "error";

const consoleWrite =
	(level: ConsoleLevel) =>
	(obj: unknown, msg?: string): void => {
		const line = `[${formatTimestamp(new Date())}] ${msg ?? ""}`.trim();
		console[level === "info" ? "log" : level](line, obj);
	};

const consoleLogger: LoggerLike = {
	info: consoleWrite("info"),
	debug: consoleWrite("debug"),
	warn: consoleWrite("warn"),
	error: consoleWrite("error"),
	child: () => consoleLogger,
};

export function safePreview(input: string, maxLen = 120): string {
  const oneLine = input.replace(/\s+/g, " ").trim();
  if (oneLine.length <= maxLen) return oneLine;
  return `${oneLine.slice(0, maxLen)}…`;
}

export function ensureLogger(log?: LoggerLike): LoggerLike {
	return log ?? consoleLogger;
}

export function childLogger(
	log: LoggerLike,
	bindings: Record<string, unknown>
): LoggerLike {
	return log.child ? log.child(bindings) : log;
}

export function errorMessage(e: unknown): string {
	return e instanceof Error ? e.message : String(e);
}
