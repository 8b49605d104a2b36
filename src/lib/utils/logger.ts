// Scoped console logger

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_RANK: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100
};

let activeLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
	activeLevel = level;
}

export function getLogLevel(): LogLevel {
	return activeLevel;
}

export interface Logger {
	debug(message: string, data?: unknown): void;
	info(message: string, data?: unknown): void;
	warn(message: string, data?: unknown): void;
	error(message: string, error?: unknown): void;
}

function enabled(level: LogLevel): boolean {
	return LEVEL_RANK[level] >= LEVEL_RANK[activeLevel];
}

/** Logger whose lines are prefixed with `[scope]` */
export function createLogger(scope: string): Logger {
	const prefix = `[${scope}]`;
	return {
		debug(message, data) {
			if (enabled('debug')) console.debug(prefix, message, ...(data === undefined ? [] : [data]));
		},
		info(message, data) {
			if (enabled('info')) console.info(prefix, message, ...(data === undefined ? [] : [data]));
		},
		warn(message, data) {
			if (enabled('warn')) console.warn(prefix, message, ...(data === undefined ? [] : [data]));
		},
		error(message, error) {
			if (enabled('error')) console.error(prefix, message, ...(error === undefined ? [] : [error]));
		}
	};
}
