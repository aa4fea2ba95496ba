// spell-checker:ignore (shell) stty tput

import { execFileSync } from 'node:child_process';

//===

export type ConsoleSize = { columns: number; rows: number };

/** Anything that may know the size of the console it writes to (eg, `process.stdout`). */
export type SizedStream = { columns?: number; rows?: number; isTTY?: boolean };

/** Options for ConsoleSize functions ...
 * * `fallbackStreams` ~ streams to query if the initial stream fails ; default = [`process.stderr`, `process.stdout`]
 * * `envFallback` ~ fallback to `$COLUMNS`/`$LINES` if all streams fail ; default = true
 * * `shellFallback` ~ fallback to `tput` (POSIX) if everything else fails ; default = true
 * * `useCache` ~ cache/memoize prior shell results ; default = true
 */
export type ConsoleSizeOptions = {
	envFallback: boolean;
	fallbackStreams: SizedStream[];
	shellFallback: boolean;
	useCache: boolean;
};

const isWinOS = process.platform === 'win32';

// * only shell results are memoized; stream sizes are cheap and change on resize
let shellSizeCache: ConsoleSize | null | undefined;

//===

// consoleSize()
/** Get the size of the console used by `stream` as columns/rows.
 * * _`no-throw`_ function (returns `undefined` upon any error)
 *
 * ```ts
 * const { columns, rows } = consoleSize(process.stderr) ?? { columns: 80, rows: 24 };
 * ```
 *
 * @tags no-throw
 */
export function consoleSize(
	stream: SizedStream = process.stdout,
	options_: Partial<ConsoleSizeOptions> = {},
): ConsoleSize | undefined {
	const options: ConsoleSizeOptions = {
		envFallback: true,
		fallbackStreams: [process.stderr, process.stdout],
		shellFallback: true,
		useCache: true,
		...options_,
	};
	return consoleSizeViaStreams([stream, ...options.fallbackStreams]) ??
		(options.envFallback ? consoleSizeViaEnv() : undefined) ??
		(options.shellFallback ? consoleSizeViaTPUT(options.useCache) : undefined);
}

// consoleSizeViaStreams()
/** Get the size reported by the first TTY stream (in order) which knows its dimensions.
 *
 * @tags no-throw
 */
export function consoleSizeViaStreams(streams: SizedStream[]): ConsoleSize | undefined {
	for (const stream of streams) {
		const { columns, rows } = stream;
		if (stream.isTTY && isPositiveInteger(columns) && isPositiveInteger(rows)) {
			return { columns, rows };
		}
	}
	return undefined;
}

// consoleSizeViaEnv()
/** Get the size of the console from the `COLUMNS` and `LINES` environment variables.
 * * most shells set these for interactive sessions but don't export them; so, expect `undefined` for child processes
 *
 * @tags no-throw
 */
export function consoleSizeViaEnv(env: NodeJS.ProcessEnv = process.env): ConsoleSize | undefined {
	const columns = Number(env.COLUMNS);
	const rows = Number(env.LINES);
	return (isPositiveInteger(columns) && isPositiveInteger(rows)) ? { columns, rows } : undefined;
}

// consoleSizeViaTPUT()
/** Get the size of the console as columns/rows, using the `tput` shell command.
 * * note: `tput` is resilient to STDIN, STDOUT, and STDERR redirects, but requires two system shell calls
 *
 * @tags non-winos-only, no-throw
 */
export function consoleSizeViaTPUT(useCache = true): ConsoleSize | undefined {
	if (isWinOS) return undefined;
	if (useCache && shellSizeCache !== undefined) return shellSizeCache ?? undefined;
	const columns = Number(execNT('tput', ['cols']));
	const rows = Number(execNT('tput', ['lines']));
	const size = (isPositiveInteger(columns) && isPositiveInteger(rows)) ? { columns, rows } : undefined;
	shellSizeCache = size ?? null;
	return size;
}

//=== utils

function isPositiveInteger(n: number | undefined): n is number {
	return (n != null) && Number.isInteger(n) && (n > 0);
}

/** Run `cmd` and return its trimmed STDOUT.
 * * _`no-throw`_ function (returns `undefined` upon any error)
 */
function execNT(cmd: string, args: string[]) {
	try {
		return execFileSync(cmd, args, {
			encoding: 'utf8',
			stdio: ['ignore', 'pipe', 'ignore'],
			timeout: 1000,
		}).trim();
	} catch {
		return undefined;
	}
}
