import {appendFileSync, mkdirSync} from 'fs';
import {dirname} from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

export interface LoggerOptions {
	level?: LogLevel;
	console?: boolean; // Write to stderr (off while the Ink menu owns the terminal)
	filePath?: string | null; // Append to this file, null disables file output
}

export function isLogLevel(value: unknown): value is LogLevel {
	return typeof value === 'string' && Object.hasOwn(LEVEL_ORDER, value);
}

function formatDetail(detail: unknown): string {
	if (detail instanceof Error) {
		return detail.stack ?? detail.message;
	}
	if (typeof detail === 'string') {
		return detail;
	}
	try {
		return JSON.stringify(detail);
	} catch {
		return String(detail);
	}
}

/**
 * Process-wide logger. The CLI entry point configures it once at startup
 * and tears the file output down on exit.
 */
export class Logger {
	private level: LogLevel = 'info';
	private consoleEnabled = true;
	private filePath: string | null = null;

	constructor(private readonly name: string) {}

	configure(options: LoggerOptions): void {
		if (options.level) {
			this.level = options.level;
		}
		if (options.console !== undefined) {
			this.consoleEnabled = options.console;
		}
		if (options.filePath !== undefined) {
			this.filePath = options.filePath;
			if (this.filePath) {
				mkdirSync(dirname(this.filePath), {recursive: true});
			}
		}
	}

	getFilePath(): string | null {
		return this.filePath;
	}

	isLevelEnabled(level: LogLevel): boolean {
		return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
	}

	debug(message: string, ...details: unknown[]): void {
		this.log('debug', message, details);
	}

	info(message: string, ...details: unknown[]): void {
		this.log('info', message, details);
	}

	warn(message: string, ...details: unknown[]): void {
		this.log('warn', message, details);
	}

	error(message: string, ...details: unknown[]): void {
		this.log('error', message, details);
	}

	private log(level: LogLevel, message: string, details: unknown[]): void {
		if (!this.isLevelEnabled(level)) {
			return;
		}

		const suffix = details.length
			? ` ${details.map(formatDetail).join(' ')}`
			: '';
		const line = `${new Date().toISOString()} - ${this.name} - ${level.toUpperCase()} - ${message}${suffix}\n`;

		if (this.consoleEnabled) {
			process.stderr.write(line);
		}
		if (this.filePath) {
			try {
				appendFileSync(this.filePath, line, 'utf-8');
			} catch (error) {
				// Stop writing to a file we cannot append to
				this.filePath = null;
				process.stderr.write(
					`Failed to write log file, file logging disabled: ${formatDetail(error)}\n`,
				);
			}
		}
	}
}

export const logger = new Logger('deskflip');
