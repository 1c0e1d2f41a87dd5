// src/cli/config.ts

/**
 * Reads the command line tool's settings out of the environment.
 */

import 'dotenv/config'; // Imports all properties of process.env, if it exists

import * as z from 'zod';
import path from 'path';
import { fileURLToPath } from 'node:url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// Type Definitions ------------------------------------------------------------

interface Config {
	/** Absolute path of the directory log files are appended to. */
	logDir: string;
	/** When false, nothing is written to the log directory. */
	logToFile: boolean;
}

// Schema ----------------------------------------------------------------------

/** The project root's logs/ directory. The same two levels up from src/cli/ and dist/cli/. */
const DEFAULT_LOG_DIR = path.join(__dirname, '..', '..', 'logs');

const envSchema = z.object({
	CHESS_VISION_LOG_DIR: z.string().trim().optional(),
	CHESS_VISION_LOG_TO_FILE: z.enum(['true', 'false']).default('true'),
});

// Functions -------------------------------------------------------------------

/**
 * Validates the environment variables and turns them into the config.
 * Throws if one of them is set to something it can't be.
 */
function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
	const result = envSchema.safeParse(env);
	if (!result.success) {
		throw new Error(`Invalid environment configuration:\n${JSON.stringify(z.treeifyError(result.error), null, 2)}`);
	}

	return {
		logDir: path.resolve(result.data.CHESS_VISION_LOG_DIR || DEFAULT_LOG_DIR), // Empty counts as unset
		logToFile: result.data.CHESS_VISION_LOG_TO_FILE === 'true',
	};
}

export { loadConfig, DEFAULT_LOG_DIR };

export type { Config };
