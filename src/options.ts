import { chalk, type ForegroundColorName, z } from '../deps.ts';
import { ConfigurationError } from './errors.ts';
import type { Logger } from './logger.ts';

/** Destination for the progress block; `process.stderr` by default. */
export interface ProgressWriter {
	write(chunk: string): unknown;
	isTTY?: boolean;
	columns?: number;
}

/** Options for a single progress line; may be given per worker. */
export interface LineOptions {
	cancelTemplate?: string | null;
	clearOnComplete?: boolean;
	color?: ForegroundColorName | null;
	completeTemplate?: string | null;
	label?: string;
	progressBarSymbolComplete?: string;
	progressBarSymbolIncomplete?: string;
	progressBarSymbolIntermediate?: string[];
	progressBarSymbolLeader?: string;
	progressBarWidthMax?: number;
	progressBarWidthMin?: number;
	progressTemplate?: string;
	tokenOverrides?: [string, string][];
}

/** Options for the display block as a whole; shared by every line drawn into it. */
export interface RenderOptions {
	displayAlways?: boolean;
	enabled?: boolean;
	hideCursor?: boolean;
	minUpdateInterval?: number;
	ttyColumns?: number;
	writer?: ProgressWriter;
}

export type ProgressOptions = LineOptions & RenderOptions;

/** Options shared by both coordinators. */
export interface CoordinatorOptions extends ProgressOptions {
	/** bound on queued, unconsumed updates; unbounded by default */
	capacity?: number;
	logger?: Logger;
}

export const DEFAULT_LINE_OPTIONS: Readonly<Required<LineOptions>> = {
	cancelTemplate: null,
	clearOnComplete: false,
	color: null,
	completeTemplate: null,
	label: '',
	progressBarSymbolComplete: chalk.bgGreen(' '),
	progressBarSymbolIncomplete: chalk.bgWhite(' '),
	progressBarSymbolIntermediate: [],
	progressBarSymbolLeader: '',
	progressBarWidthMax: 50, // characters
	progressBarWidthMin: 10, // characters
	progressTemplate: '{label} {percent}% {bar} ({elapsed}s) {value}/{goal}',
	tokenOverrides: [],
};

export const DEFAULT_RENDER_OPTIONS: Readonly<Omit<Required<RenderOptions>, 'ttyColumns' | 'writer'>> = {
	displayAlways: false,
	enabled: true,
	hideCursor: false,
	minUpdateInterval: 20, // ms
};

const LINE_OPTION_KEYS: ReadonlySet<string> = new Set(Object.keys(DEFAULT_LINE_OPTIONS));

/** Merge line options; later layers override earlier ones (default < shared < per-worker).
 * * `undefined` values and render options within a layer are skipped
 */
export function mergeLineOptions(...layers: (LineOptions | undefined)[]): Required<LineOptions> {
	const merged: Required<LineOptions> = { ...DEFAULT_LINE_OPTIONS };
	for (const layer of layers) {
		if (layer == null) continue;
		Object.assign(
			merged,
			Object.fromEntries(
				Object.entries(layer).filter(([key, value]) => LINE_OPTION_KEYS.has(key) && (value !== undefined)),
			),
		);
	}
	return merged;
}

//=== construction argument validation

const countSchema = z.number().int().nonnegative();

export const lengthsSchema = z.array(countSchema, {
	invalid_type_error: '`lengths` must be an array of non-negative integers',
});

export const coordinatorArgsSchema = z
	.object({
		amount: z.number().int().positive().optional(),
		capacity: z.number().int().positive().optional(),
		lengths: lengthsSchema,
		minUpdateInterval: z.number().nonnegative().optional(),
		offset: z.number().int().nonnegative().optional(),
		workerOptionCount: z.number().int().nonnegative().optional(),
	})
	.refine(
		(args) => (args.workerOptionCount == null) || (args.workerOptionCount === args.lengths.length),
		{ message: 'per-worker options must match `lengths` in count', path: ['workers'] },
	);

export type CoordinatorArgs = z.input<typeof coordinatorArgsSchema>;

/** Validate construction arguments.
 * @throws {ConfigurationError} on any rejected argument (before any terminal output)
 */
export function validateCoordinatorArgs(args: CoordinatorArgs): void {
	const result = coordinatorArgsSchema.safeParse(args);
	if (!result.success) {
		throw new ConfigurationError(
			result.error.issues.map((issue) =>
				(issue.path.length > 0) ? `${issue.path.join('.')}: ${issue.message}` : issue.message
			),
		);
	}
}
