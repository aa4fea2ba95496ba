import { describe, expect, it } from 'vitest';

import { consoleSize, consoleSizeViaEnv, consoleSizeViaStreams } from './consoleSize.ts';

describe('consoleSizeViaStreams', () => {
	it('uses the first TTY stream with known dimensions', () => {
		const piped = { isTTY: false, columns: 100, rows: 30 };
		const unsized = { isTTY: true };
		const tty = { isTTY: true, columns: 120, rows: 40 };
		expect(consoleSizeViaStreams([piped, unsized, tty])).toEqual({ columns: 120, rows: 40 });
	});

	it('is undefined without a usable stream', () => {
		expect(consoleSizeViaStreams([{ isTTY: true, columns: 0, rows: 24 }])).toBeUndefined();
	});
});

describe('consoleSizeViaEnv', () => {
	it('reads COLUMNS and LINES', () => {
		expect(consoleSizeViaEnv({ COLUMNS: '132', LINES: '43' })).toEqual({ columns: 132, rows: 43 });
	});

	it('is undefined when either is missing or malformed', () => {
		expect(consoleSizeViaEnv({ COLUMNS: '132' })).toBeUndefined();
		expect(consoleSizeViaEnv({ COLUMNS: 'wide', LINES: '43' })).toBeUndefined();
	});
});

describe('consoleSize', () => {
	it('prefers the given stream', () => {
		expect(consoleSize({ isTTY: true, columns: 90, rows: 20 })).toEqual({ columns: 90, rows: 20 });
	});

	it('is undefined when every fallback is disabled or fails', () => {
		expect(
			consoleSize({ isTTY: false }, { fallbackStreams: [], envFallback: false, shellFallback: false }),
		).toBeUndefined();
	});
});
