import { chalk, cliTruncate, sprintf, stringWidth } from '../deps.ts';
import type { LineOptions } from './options.ts';

export type LineState = 'active' | 'finished' | 'cancelled';

export interface RenderContext {
	/** time since the line was first drawn (in ms) */
	elapsedMs: number;
	state: LineState;
	ttyColumns: number;
}

const oneDecimal = new Intl.NumberFormat(undefined, {
	minimumIntegerDigits: 1,
	minimumFractionDigits: 1,
	maximumFractionDigits: 1,
});
const twoDecimals = new Intl.NumberFormat(undefined, {
	minimumIntegerDigits: 1,
	minimumFractionDigits: 2,
	maximumFractionDigits: 2,
});
const wholeNumber = new Intl.NumberFormat(undefined, {
	minimumIntegerDigits: 1,
	minimumFractionDigits: 0,
	maximumFractionDigits: 0,
});

/** Common display width of a set of bar symbols; symbols are laid down in units of this width. */
export function symbolWidthOf(options: Required<LineOptions>): number {
	return Math.max(
		1,
		stringWidth(options.progressBarSymbolComplete),
		stringWidth(options.progressBarSymbolIncomplete),
		...options.progressBarSymbolIntermediate.map((e) => stringWidth(e)),
		stringWidth(options.progressBarSymbolLeader),
	);
}

/** Render the display text of one progress line.
 * * `value` is clamped into `[0, goal]` for display only
 * * a `null` template for the line's state falls back to `progressTemplate`
 */
export function renderLine(value: number, goal: number, options: Required<LineOptions>, context: RenderContext): string {
	const { elapsedMs, state, ttyColumns } = context;

	let v = value;
	if ((isNaN(v)) || (v < 0)) v = 0;
	if (v > goal) v = goal;

	const completed = state === 'finished';
	const seconds = elapsedMs / 1000;

	const elapsed = sprintf('%s', oneDecimal.format(seconds));
	const eta = sprintf('%s', oneDecimal.format((goal - v) / (v / seconds)));
	const percent = sprintf('%3s', wholeNumber.format((goal > 0) ? (v / goal) * 100 : 100));
	const rate = sprintf('%s', twoDecimals.format(v / seconds));

	const template = (state === 'finished' ? options.completeTemplate : undefined) ??
		(state === 'cancelled' ? options.cancelTemplate : undefined) ??
		options.progressTemplate;

	// replace all token overrides, then all (remaining) standard tokens
	let text = template;
	for (const [token, replacement] of options.tokenOverrides) {
		text = text.replace(`{${token}}`, replacement);
	}
	const label = options.label;
	text = text
		.replaceAll('{elapsed}', elapsed)
		.replaceAll('{eta}', eta)
		.replaceAll('{goal}', `${goal}`)
		.replaceAll('{percent}', percent)
		.replaceAll('{rate}', rate)
		.replaceAll('{value}', `${v}`)
		.replaceAll(/(\s?){label}(\s?)/g, label.length ? ('$1' + label + '$2') : '');

	if (text.includes('{bar}')) {
		// * only one flexible `{bar}` is supported; only the first is replaced
		// * `stringWidth()` instead of `.length` to count visual columns (full-width characters, ANSI escapes)
		const availableSpace = Math.max(0, ttyColumns - stringWidth(text.replace('{bar}', '')) - 1);
		text = text.replace('{bar}', renderBar(v, goal, completed, availableSpace, options));
	}

	text = cliTruncate(text, ttyColumns - 1);
	return (options.color != null) ? chalk[options.color](text) : text;
}

/** Render the bar gauge, `availableSpace` columns at most (but never narrower than the minimum width). */
export function renderBar(
	v: number,
	goal: number,
	completed: boolean,
	availableSpace: number,
	options: Required<LineOptions>,
): string {
	const symbolWidth = symbolWidthOf(options);
	// max/min bar widths are multiples of symbol width; max - round down; min - round up
	const widthMin = options.progressBarWidthMin + (options.progressBarWidthMin % symbolWidth);
	const widthMax = options.progressBarWidthMax - (options.progressBarWidthMax % symbolWidth);
	const width = Math.max(Math.min(widthMax, availableSpace), widthMin);

	const partialSubGauge = options.progressBarSymbolIntermediate;
	const isPrecise = partialSubGauge.length > 0;

	const completeWidth = width * ((goal > 0) ? v / goal : 1); // full width if goal is 0
	const fullyCompleteWidth = Math.floor(completeWidth);
	const alignedCompleteWidth = fullyCompleteWidth - (fullyCompleteWidth % symbolWidth);

	let intermediary = '';
	const partialPercentage = (completeWidth - alignedCompleteWidth) / symbolWidth;
	if (isPrecise && !completed && (partialPercentage > 0)) {
		intermediary = partialSubGauge[Math.floor(partialSubGauge.length * partialPercentage)] ?? '';
	}
	const anyCompleteWidth = alignedCompleteWidth + stringWidth(intermediary);
	const leader = (completed || (anyCompleteWidth >= width)) ? '' : options.progressBarSymbolLeader;

	const incompleteWidth = width - alignedCompleteWidth - stringWidth(intermediary) - stringWidth(leader);

	const complete = options.progressBarSymbolComplete.repeat(alignedCompleteWidth / symbolWidth);
	const incomplete = options.progressBarSymbolIncomplete.repeat(
		Math.max(Math.floor(incompleteWidth / symbolWidth), 0),
	);

	return complete + intermediary + leader + incomplete;
}
