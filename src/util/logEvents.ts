// src/util/logEvents.ts

import { format } from 'date-fns';
import fs from 'node:fs';
import path from 'node:path';


// Types ========================================================


type LogLevel = 'silent' | 'error' | 'debug';

interface LoggingOptions {
	/** How much is printed to the console and appended to log files. */
	level: LogLevel;
	/** The directory log files are appended to. Nothing is written to disk when undefined. */
	logDir: string | undefined;
}


// State ========================================================


const LOG_LEVEL_RANK: Record<LogLevel, number> = {
	silent: 0,
	error: 1,
	debug: 2,
};

const loggingOptions: LoggingOptions = {
	level: 'error',
	logDir: undefined,
};


// Functions ====================================================


/** Updates the logging options. Unspecified options are left as they are. */
function configureLogging(options: Partial<LoggingOptions>): void {
	if (options.level !== undefined) loggingOptions.level = options.level;
	if ('logDir' in options) loggingOptions.logDir = options.logDir;
}

/** Returns a copy of the current logging options. */
function getLoggingOptions(): LoggingOptions {
	return { ...loggingOptions };
}

function isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
	return LOG_LEVEL_RANK[loggingOptions.level] >= LOG_LEVEL_RANK[level];
}

/**
 * Logs the provided message by appending a line to the end of the specified log file.
 * Does nothing when logging is silenced or no log directory is configured.
 * @param message - The message to log.
 * @param logName - The name of the log file.
 */
function logEvents(message: string, logName: string): void {
	if (loggingOptions.level === 'silent' || loggingOptions.logDir === undefined) return;

	const dateTime = format(new Date(), 'yyyy/MM/dd  HH:mm:ss');
	const logItem = `${dateTime}   ${message}\n`;

	try {
		fs.mkdirSync(loggingOptions.logDir, { recursive: true });
		fs.appendFileSync(path.join(loggingOptions.logDir, logName), logItem);
	} catch (err: unknown) {
		if (err instanceof Error) console.error(`Error logging event: ${err.message}`);
		else console.error('Error logging event:', err);
	}
}

/**
 * Logs the provided message by appending a line to the end of the specified log file,
 * and prints it to the console as an error.
 * @param message - The message to log.
 * @param logName - The name of the log file.
 */
function logEventsAndPrint(message: string, logName: string): void {
	if (!isEnabled('error')) return;
	console.error(message);
	logEvents(message, logName);
}

/**
 * Prints a diagnostic message and appends it to `debugLog.txt`,
 * only when the log level is `debug`.
 */
function logDebug(message: string): void {
	if (!isEnabled('debug')) return;
	console.debug(message);
	logEvents(message, 'debugLog.txt');
}

export type { LogLevel, LoggingOptions };

export {
	configureLogging,
	getLoggingOptions,
	logEvents,
	logEventsAndPrint,
	logDebug,
};
