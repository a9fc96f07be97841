/**
 * Structured Logging Module
 *
 * Structured log entries written to stderr and, when a log directory is
 * configured, appended to a JSON Lines (.jsonl) file.
 */

import * as fs from 'fs';
import * as path from 'path';

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

export function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some(level => level === value);
}

/**
 * Log entry structure
 */
export interface LogEntry {
	timestamp: string;
	level: LogLevel;
	message: string;
	context?: Record<string, unknown>;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
	/** Directory for the .jsonl log file (default: no file output) */
	logDir?: string;
	/** Enable console output (default: true) */
	console?: boolean;
	/** Minimum log level for console output (default: warn) */
	consoleLevel?: LogLevel;
	/** Console sink, stderr by default */
	write?: (line: string) => void;
}

export const LOG_FILE_NAME = 'cuda-arch-flags.jsonl';

/**
 * Structured logger for resolver and CLI operations
 */
export class Logger {
	private logFile: string | null;
	private consoleEnabled: boolean;
	private readonly consoleLevel: LogLevel;
	private write: (line: string) => void;

	constructor(config: LoggerConfig = {}) {
		this.consoleEnabled = config.console ?? true;
		this.consoleLevel = config.consoleLevel ?? 'warn';
		this.write = config.write ?? ((line) => process.stderr.write(line + '\n'));
		this.logFile = null;

		if (config.logDir) {
			if (!fs.existsSync(config.logDir)) {
				fs.mkdirSync(config.logDir, { recursive: true });
			}
			this.logFile = path.join(config.logDir, LOG_FILE_NAME);
		}
	}

	/**
	 * Get log file path, or null when file logging is off
	 */
	getLogFile(): string | null {
		return this.logFile;
	}

	/**
	 * Write log entry to file
	 */
	private writeLogEntry(entry: LogEntry): void {
		if (!this.logFile) {
			return;
		}

		const logLine = JSON.stringify(entry) + '\n';

		try {
			fs.appendFileSync(this.logFile, logLine, 'utf8');
		} catch (error) {
			// Fall back to console if file write fails
			this.write(`[LOGGER ERROR] Failed to write log: ${error instanceof Error ? error.message : String(error)}`);
			this.write(`[ORIGINAL LOG] ${logLine.trimEnd()}`);
		}
	}

	/**
	 * Output to console if enabled
	 */
	private outputToConsole(entry: LogEntry): void {
		if (!this.consoleEnabled) {
			return;
		}

		if (LOG_LEVELS.indexOf(entry.level) < LOG_LEVELS.indexOf(this.consoleLevel)) {
			return;
		}

		const prefix = `[${entry.level.toUpperCase()}] ${entry.timestamp}`;
		const context = entry.context ? ` ${JSON.stringify(entry.context)}` : '';
		this.write(`${prefix} ${entry.message}${context}`);
	}

	/**
	 * Log a general message
	 */
	log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
		const entry: LogEntry = {
			timestamp: new Date().toISOString(),
			level,
			message,
			context,
		};

		this.writeLogEntry(entry);
		this.outputToConsole(entry);
	}

	/**
	 * Convenience methods for different log levels
	 */
	debug(message: string, context?: Record<string, unknown>): void {
		this.log('debug', message, context);
	}

	info(message: string, context?: Record<string, unknown>): void {
		this.log('info', message, context);
	}

	warn(message: string, context?: Record<string, unknown>): void {
		this.log('warn', message, context);
	}

	error(message: string, context?: Record<string, unknown>): void {
		this.log('error', message, context);
	}

	fatal(message: string, context?: Record<string, unknown>): void {
		this.log('fatal', message, context);
	}

	/**
	 * Logs command execution
	 */
	logCommand(command: string, args: Record<string, unknown>, startTime: number): void {
		this.debug(`Command executed: ${command}`, {
			command,
			args,
			duration_ms: Date.now() - startTime,
		});
	}
}
