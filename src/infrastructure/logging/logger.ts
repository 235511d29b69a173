/**
 * Log level enum
 * Defines the severity levels for logging
 */
export enum LogLevel {
	DEBUG = 'debug',
	INFO = 'info',
	WARN = 'warn',
	ERROR = 'error',
}

export type LogContext = Record<string, unknown>;

/**
 * Logger interface
 * Defines the contract for logger implementations
 */
export interface ILogger {
	debug(message: string, context?: LogContext): void;
	info(message: string, context?: LogContext): void;
	warn(message: string, context?: LogContext): void;
	error(message: string, context?: LogContext): void;

	/**
	 * Derives a logger whose messages are tagged with `scope`
	 */
	child(scope: string): ILogger;
}

export interface ConsoleLoggerOptions {
	readonly level?: LogLevel;
	readonly structured?: boolean;
	readonly scope?: string;
	/** Defaults to stderr; stdout belongs to the stdio transport. */
	readonly write?: (line: string) => void;
}

const LEVEL_ORDER: readonly LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

/**
 * Console logger implementation
 * Writes one line per message to stderr, as JSON when structured
 */
export class ConsoleLogger implements ILogger {
	private readonly level: LogLevel;
	private readonly structured: boolean;
	private readonly scope?: string;
	private readonly write: (line: string) => void;

	constructor({ level = LogLevel.INFO, structured = true, scope, write }: ConsoleLoggerOptions = {}) {
		this.level = level;
		this.structured = structured;
		this.scope = scope;
		this.write = write ?? ((line) => process.stderr.write(line));
	}

	debug(message: string, context?: LogContext): void {
		this.log(LogLevel.DEBUG, message, context);
	}

	info(message: string, context?: LogContext): void {
		this.log(LogLevel.INFO, message, context);
	}

	warn(message: string, context?: LogContext): void {
		this.log(LogLevel.WARN, message, context);
	}

	error(message: string, context?: LogContext): void {
		this.log(LogLevel.ERROR, message, context);
	}

	child(scope: string): ILogger {
		return new ConsoleLogger({
			level: this.level,
			structured: this.structured,
			scope: this.scope ? `${this.scope}:${scope}` : scope,
			write: this.write,
		});
	}

	private log(level: LogLevel, message: string, context?: LogContext): void {
		if (!this.shouldLog(level)) {
			return;
		}
		this.write(`${this.format(level, message, context)}\n`);
	}

	private format(level: LogLevel, message: string, context?: LogContext): string {
		if (this.structured) {
			return JSON.stringify({
				level,
				time: new Date().toISOString(),
				...(this.scope ? { scope: this.scope } : {}),
				message,
				...(context ? { context } : {}),
			});
		}

		const prefix = this.scope ? `[${level.toUpperCase()}] [${this.scope}]` : `[${level.toUpperCase()}]`;
		return context ? `${prefix} ${message} ${JSON.stringify(context)}` : `${prefix} ${message}`;
	}

	/**
	 * Checks if a message with the given level should be logged
	 */
	private shouldLog(messageLevel: LogLevel): boolean {
		return LEVEL_ORDER.indexOf(messageLevel) >= LEVEL_ORDER.indexOf(this.level);
	}
}

/**
 * A logger that drops everything, for tests and embedding
 */
export const silentLogger: ILogger = {
	debug: () => undefined,
	info: () => undefined,
	warn: () => undefined,
	error: () => undefined,
	child: () => silentLogger,
};
