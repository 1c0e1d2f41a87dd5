// src/cli/utility/zodlogger.ts

import * as z from 'zod';
import { logEvents, logEventsAndPrint } from './logEvents.js';

/**
 * A consistent way of logging all malformed command line input.
 * Puts all details in `zodLog.txt`, and a one-liner notifier in `errLog.txt` and in the console.
 * @param input - The raw arguments that were malformed.
 * @param zodError - The ZodError from the zod result during validation.
 * @param contextMessage - Brief description of where this error occurred. e.g. "Received malformed arguments for the move command."
 */
export async function logZodError(input: unknown, zodError: z.ZodError, contextMessage: string): Promise<void> {
	const treeifiedErrors = JSON.stringify(z.treeifyError(zodError), null, 2);
	const logText = `${contextMessage} - Input:
${JSON.stringify(input, null, 2)}

Zod treeified errors:
${treeifiedErrors}

===================================================================

	`;

	await logEvents(logText, 'zodLog.txt');
	await logEventsAndPrint(`${contextMessage} Check zodLog.txt for more details.`, 'errLog.txt');
}
