import { foregroundColorNames, type ForegroundColorName, z } from '../deps.ts';
import { ProtocolViolationError } from './errors.ts';
import type { LineOptions } from './options.ts';

/** An update to one progress bar. */
export type UpdateMessage =
	| { kind: 'next' }
	| { kind: 'setValue'; value: number }
	| { kind: 'finish' }
	| { kind: 'cancel' }
	| { kind: 'update'; options: LineOptions };

/** An update addressed to one worker's bar of a `MultipleProgress`. */
export interface WorkerMessage {
	workerId: number;
	message: UpdateMessage;
}

/** Counts (and `setValue` values) are whole numbers >= 0. */
export function isCount(value: number): boolean {
	return Number.isInteger(value) && (value >= 0);
}

//=== validation of messages arriving from other threads/processes

const colorNames: ReadonlySet<string> = new Set(foregroundColorNames);

const colorSchema = z.string().refine(
	(name): name is ForegroundColorName => colorNames.has(name),
	{ message: 'unknown color name' },
);

export const lineOptionsSchema = z
	.object({
		cancelTemplate: z.string().nullable(),
		clearOnComplete: z.boolean(),
		color: colorSchema.nullable(),
		completeTemplate: z.string().nullable(),
		label: z.string(),
		progressBarSymbolComplete: z.string(),
		progressBarSymbolIncomplete: z.string(),
		progressBarSymbolIntermediate: z.array(z.string()),
		progressBarSymbolLeader: z.string(),
		progressBarWidthMax: z.number().int().nonnegative(),
		progressBarWidthMin: z.number().int().nonnegative(),
		progressTemplate: z.string(),
		tokenOverrides: z.array(z.tuple([z.string(), z.string()])),
	})
	.partial()
	.strict();

export const updateMessageSchema: z.ZodType<UpdateMessage, z.ZodTypeDef, unknown> = z.discriminatedUnion('kind', [
	z.object({ kind: z.literal('next') }),
	z.object({ kind: z.literal('setValue'), value: z.number().int().nonnegative() }),
	z.object({ kind: z.literal('finish') }),
	z.object({ kind: z.literal('cancel') }),
	z.object({ kind: z.literal('update'), options: lineOptionsSchema }),
]);

export const workerMessageSchema: z.ZodType<WorkerMessage, z.ZodTypeDef, unknown> = z.object({
	workerId: z.number().int(),
	message: updateMessageSchema,
});

/** Validate a payload received from another thread/process.
 * @throws {ProtocolViolationError} for anything but a well-formed `WorkerMessage`
 */
export function parseWorkerMessage(data: unknown): WorkerMessage {
	const result = workerMessageSchema.safeParse(data);
	if (!result.success) {
		throw new ProtocolViolationError(
			`malformed worker message (${result.error.issues.map((issue) => issue.message).join('; ')})`,
		);
	}
	return result.data;
}
