// src/cli/utility/errorguard.test.ts

import { describe, it, expect, vi } from 'vitest';

import { executeSafely } from './errorguard.js';
import { logEventsAndPrint } from './logEvents.js';

describe('errorguard', () => {
	describe('executeSafely', () => {
		it('should return true when the callback succeeds', async () => {
			const callback = vi.fn();
			expect(await executeSafely(callback, 'Should not be logged')).toBe(true);
			expect(callback).toHaveBeenCalledOnce();
			expect(vi.mocked(logEventsAndPrint)).not.toHaveBeenCalled();
		});

		it('should log the message and the stack when the callback throws', async () => {
			const completed = await executeSafely(() => {
				throw new Error('boom');
			}, 'Something went wrong.');

			expect(completed).toBe(false);
			expect(vi.mocked(logEventsAndPrint)).toHaveBeenCalledWith(expect.stringMatching(/^Something went wrong\.\nError: boom/), 'errLog.txt');
		});

		it('should catch rejected promises too', async () => {
			const completed = await executeSafely(async () => {
				await Promise.reject(new Error('async boom'));
			}, 'Async failure.');

			expect(completed).toBe(false);
			expect(vi.mocked(logEventsAndPrint)).toHaveBeenCalledWith(expect.stringMatching(/^Async failure\.\nError: async boom/), 'errLog.txt');
		});
	});
});
