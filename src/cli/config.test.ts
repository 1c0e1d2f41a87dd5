// src/cli/config.test.ts

import { describe, it, expect } from 'vitest';
import path from 'path';

import { DEFAULT_LOG_DIR, loadConfig } from './config.js';

describe('config', () => {
	describe('loadConfig', () => {
		it('should log to the project\'s logs directory by default', () => {
			expect(loadConfig({})).toEqual({ logDir: path.resolve(DEFAULT_LOG_DIR), logToFile: true });
		});

		it('should read the log directory and switch from the environment', () => {
			const logDir = path.resolve('test-logs');
			expect(loadConfig({ CHESS_VISION_LOG_DIR: logDir, CHESS_VISION_LOG_TO_FILE: 'false' })).toEqual({ logDir, logToFile: false });
		});

		it('should treat an empty log directory as unset', () => {
			expect(loadConfig({ CHESS_VISION_LOG_DIR: '  ' }).logDir).toBe(path.resolve(DEFAULT_LOG_DIR));
		});

		it('should throw on a switch that is neither true nor false', () => {
			expect(() => loadConfig({ CHESS_VISION_LOG_TO_FILE: 'maybe' })).toThrow('Invalid environment configuration');
		});
	});
});
