/**
 * @file Internal diagnostics logger with configurable levels.
 * Query-level callbacks for library users live on `Database` (see `QueryLogger`);
 * this logger is for the library's own debug, info, warn and error output.
 */

/**
 * Available log levels in order of priority (from lowest to highest).
 */
export enum LogLevel {
	/** Log all messages (debug, info, warn, error) */
	ALL = 0,
	/** Log debug, info, warn and error messages */
	DEBUG = 10,
	/** Log info, warn and error messages */
	INFO = 20,
	/** Log warn and error messages only */
	WARN = 30,
	/** Log error messages only */
	ERROR = 40,
	/** Disable all logging */
	OFF = 50
}

/**
 * Log entry structure.
 */
export interface LogEntry {
	timestamp: Date;
	level: LogLevel;
	message: string;
	context?: string;
	data?: unknown;
}

/**
 * Logger configuration options.
 */
export interface LoggerConfig {
	/** The minimum log level to output (default: INFO) */
	level?: LogLevel;
	/** Whether to output logs to console (default: true) */
	console?: boolean;
	/** Custom log formatter function */
	formatter?: (entry: LogEntry) => string;
	/** Custom log handler function */
	handler?: (entry: LogEntry) => void;
}

/**
 * JSON replacer for log payloads; bound parameters may carry bigint and binary values.
 */
function payloadReplacer(_key: string, value: unknown): unknown
{
	if (typeof value === 'bigint') return value.toString();
	if (value instanceof Uint8Array) return `<${value.byteLength} bytes>`;
	return value;
}

/**
 * Default log formatter that creates human-readable log output.
 */
const defaultFormatter = (entry: LogEntry): string => {
	const timestamp = entry.timestamp.toISOString();
	const level = LogLevel[entry.level].padEnd(5);
	const context = entry.context ? `[${entry.context}] ` : '';
	const data = entry.data !== undefined ? ` ${JSON.stringify(entry.data, payloadReplacer)}` : '';
	return `${timestamp} ${level} ${context}${entry.message}${data}`;
};

/**
 * Logger with configurable log levels and output options.
 */
export class Logger {
	private config: Required<LoggerConfig>;

	constructor(config: LoggerConfig = {}) {
		this.config = {
			level: config.level ?? LogLevel.INFO,
			console: config.console ?? true,
			formatter: config.formatter ?? defaultFormatter,
			handler: config.handler ?? this.defaultHandler.bind(this)
		};
	}

	/**
	 * Updates the logger configuration.
	 */
	configure(config: Partial<LoggerConfig>): void {
		this.config = {
			level: config.level ?? this.config.level,
			console: config.console ?? this.config.console,
			formatter: config.formatter ?? this.config.formatter,
			handler: config.handler ?? this.config.handler
		};
	}

	getLevel(): LogLevel {
		return this.config.level;
	}

	setLevel(level: LogLevel): void {
		this.config.level = level;
	}

	private shouldLog(level: LogLevel): boolean {
		return this.config.level !== LogLevel.OFF && level >= this.config.level;
	}

	/**
	 * Default log handler that outputs to console.
	 */
	private defaultHandler(entry: LogEntry): void {
		if (!this.config.console) return;

		const formatted = this.config.formatter(entry);

		switch (entry.level) {
			case LogLevel.ERROR:
				console.error(formatted);
				break;
			case LogLevel.WARN:
				console.warn(formatted);
				break;
			case LogLevel.DEBUG:
				console.debug(formatted);
				break;
			default:
				console.log(formatted);
				break;
		}
	}

	private log(level: LogLevel, message: string, context?: string, data?: unknown): void {
		if (!this.shouldLog(level)) return;

		const entry: LogEntry = {
			timestamp: new Date(),
			level,
			message,
			context,
			data
		};

		this.config.handler(entry);
	}

	debug(message: string, context?: string, data?: unknown): void {
		this.log(LogLevel.DEBUG, message, context, data);
	}

	info(message: string, context?: string, data?: unknown): void {
		this.log(LogLevel.INFO, message, context, data);
	}

	warn(message: string, context?: string, data?: unknown): void {
		this.log(LogLevel.WARN, message, context, data);
	}

	error(message: string, context?: string, data?: unknown): void {
		this.log(LogLevel.ERROR, message, context, data);
	}
}

/**
 * Global logger instance shared by every component.
 */
export const globalLogger = new Logger();

/**
 * Context-bound view of the global logger.
 */
export interface ContextLogger {
	debug: (message: string, data?: unknown) => void;
	info: (message: string, data?: unknown) => void;
	warn: (message: string, data?: unknown) => void;
	error: (message: string, data?: unknown) => void;
}

/**
 * Returns a logger that tags every entry with the given context.
 */
export function getLogger(context?: string): ContextLogger {
	return {
		debug: (message: string, data?: unknown) => globalLogger.debug(message, context, data),
		info: (message: string, data?: unknown) => globalLogger.info(message, context, data),
		warn: (message: string, data?: unknown) => globalLogger.warn(message, context, data),
		error: (message: string, data?: unknown) => globalLogger.error(message, context, data)
	};
}
