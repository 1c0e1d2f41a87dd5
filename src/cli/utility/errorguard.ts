// src/cli/utility/errorguard.ts

/**
 * This module contains a method for safely executing functions,
 * catching any errors that may occur, logging them to the error log.
 */

import { logEventsAndPrint } from './logEvents.js';

/**
 * Executes a callback function and catches any errors that occur.
 * @param callback - The function to execute safely. May be async.
 * @param errorMessage - A custom error message to log if an error occurs.
 * @returns true if the callback executed without error.
 */
async function executeSafely(callback: () => void | Promise<void>, errorMessage: string): Promise<boolean> {
	try {
		await callback();
	} catch (e) {
		const stack = e instanceof Error ? e.stack : 'Exception is not of Error type!';
		const errText = `${errorMessage}\n${stack}`;
		await logEventsAndPrint(errText, 'errLog.txt');
		return false; // Yes error
	}
	return true; // No error
}

export { executeSafely };
