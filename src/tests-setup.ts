// src/tests-setup.ts

import { vi, afterAll } from 'vitest';

// Stop Console Bloat
// Store the original functions so we can restore them after
const originalLog = console.log;
const originalError = console.error;
const originalWarn = console.warn;
// Redirect console functions to empty functions
console.log = vi.fn();
console.error = vi.fn();
console.warn = vi.fn();

// Mock Logger to prevent file writes
// This tells Vitest whenever any file imports logEvents.js, give them these empty functions instead.
vi.mock('./cli/utility/logEvents.js', () => ({
	logEvents: vi.fn(async () => {}), // Do nothing
	logEventsAndPrint: vi.fn(async () => {}), // Do nothing
}));

// Restore console functions after tests finish so Vitest can print the summary
afterAll(() => {
	console.log = originalLog;
	console.error = originalError;
	console.warn = originalWarn;
});
