// src/cli/utility/logEvents.ts

import { format } from 'date-fns';
import { promises as fsPromises } from 'fs';
import path from 'path';

import { loadConfig } from '../config.js';

/**
 * Logs the provided message by appending a line to the end of the specified log file.
 * Does nothing if logging to file is switched off.
 * @param message - The message to log.
 * @param logName - The name of the log file.
 */
async function logEvents(message: string, logName: string): Promise<void> {
	if (!logName) return console.trace('Log name MUST be provided when logging an event!');

	const dateTime = format(new Date(), 'yyyy/MM/dd  HH:mm:ss');
	const logItem = `${dateTime}   ${message}\n`;

	try {
		const config = loadConfig();
		if (!config.logToFile) return;
		await fsPromises.mkdir(config.logDir, { recursive: true });
		await fsPromises.appendFile(path.join(config.logDir, logName), logItem);
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
async function logEventsAndPrint(message: string, logName: string): Promise<void> {
	console.error(message);
	await logEvents(message, logName);
}

export { logEvents, logEventsAndPrint };
