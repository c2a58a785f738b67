// ============================================================================
// Structured Logger
// ============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface LogRecord {
	/** ISO timestamp */
	ts: string;
	level: Exclude<LogLevel, "silent">;
	/** Short machine-friendly event name, e.g. "store.load.corrupt" */
	event: string;
	msg?: string;
	data?: Record<string, unknown>;
	/** Context bound with `with()` */
	ctx?: Record<string, unknown>;
	duration_ms?: number;
}

export type LogSink = (record: LogRecord) => void;

export interface LoggerOptions {
	/** Minimum level to emit. Default: "info" */
	level?: LogLevel;
	/** Where records go. Default: one JSON line per record on stderr */
	sink?: LogSink;
}

const LEVEL_RANK: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
};

export class Logger {
	private level: LogLevel;
	private readonly sink: LogSink;
	private readonly ctx: Record<string, unknown>;

	constructor(options?: LoggerOptions, ctx: Record<string, unknown> = {}) {
		this.level = options?.level ?? "info";
		this.sink = options?.sink ?? jsonSink;
		this.ctx = ctx;
	}

	/** Child logger with more bound context. Shares level and sink. */
	with(extra: Record<string, unknown>): Logger {
		return new Logger({ level: this.level, sink: this.sink }, { ...this.ctx, ...extra });
	}

	setLevel(level: LogLevel): void {
		this.level = level;
	}

	isEnabled(level: Exclude<LogLevel, "silent">): boolean {
		return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
	}

	debug(event: string, data?: Record<string, unknown>, msg?: string): void {
		this.emit("debug", event, data, msg);
	}

	info(event: string, data?: Record<string, unknown>, msg?: string): void {
		this.emit("info", event, data, msg);
	}

	warn(event: string, data?: Record<string, unknown>, msg?: string): void {
		this.emit("warn", event, data, msg);
	}

	error(event: string, data?: Record<string, unknown>, msg?: string): void {
		this.emit("error", event, data, msg);
	}

	/**
	 * Start a timer. Calling the returned function logs `event` at debug level
	 * with the elapsed milliseconds and returns them.
	 */
	timer(event: string, base?: Record<string, unknown>): (extra?: Record<string, unknown>) => number {
		const start = performance.now();
		return (extra) => {
			const duration = performance.now() - start;
			this.emit("debug", event, { ...base, ...extra }, undefined, duration);
			return duration;
		};
	}

	private emit(
		level: Exclude<LogLevel, "silent">,
		event: string,
		data?: Record<string, unknown>,
		msg?: string,
		duration?: number
	): void {
		if (!this.isEnabled(level)) return;

		const record: LogRecord = {
			ts: new Date().toISOString(),
			level,
			event,
		};
		if (msg !== undefined) record.msg = msg;
		if (data && Object.keys(data).length > 0) record.data = data;
		if (Object.keys(this.ctx).length > 0) record.ctx = this.ctx;
		if (duration !== undefined) record.duration_ms = Math.round(duration * 1000) / 1000;

		this.sink(record);
	}
}

// ============================================================================
// Sinks
// ============================================================================

function jsonSink(record: LogRecord): void {
	process.stderr.write(`${JSON.stringify(record)}\n`);
}

/**
 * Sink that keeps records in memory. Used by tests and by callers that
 * surface warnings in their own UI.
 */
export function memorySink(): { sink: LogSink; records: LogRecord[] } {
	const records: LogRecord[] = [];
	return { sink: (record) => records.push(record), records };
}

// ============================================================================
// Factory
// ============================================================================

export function createLogger(options?: LoggerOptions): Logger {
	return new Logger(options);
}

/** Logger used when a component is not given one */
export const defaultLogger = createLogger({ level: "warn" });
