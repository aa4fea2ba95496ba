import { ProgressDisplay } from './display.ts';
import { type LineOptions, mergeLineOptions, type ProgressOptions } from './options.ts';
import { type LineState, renderLine } from './render.ts';

/** One progress bar's numeric state, as seen by the coordinators. */
export interface ProgressTracker {
	readonly count: number;
	readonly total: number;
	readonly lineOffset: number;
	readonly state: LineState;
	advance(n?: number): void;
	setValue(value: number): void;
	finish(): void;
	cancel(): void;
	update(options: LineOptions): void;
}

/** A progress bar drawn on line `lineOffset` of a (possibly shared) `ProgressDisplay`.
 * * reaching `total` finishes the tracker; once finished or cancelled, all mutations are ignored
 * * `count` is stored as given (negative/NaN values become 0); keeping it within `total` is the caller's job
 */
export class Tracker implements ProgressTracker {
	readonly display: ProgressDisplay;
	#count = 0;
	#state: LineState = 'active';
	#options: Required<LineOptions>;
	#startTime = Date.now();

	/**
	 * @param total  count at which the tracker finishes
	 * @param lineOffset  line of the display block to draw on
	 * @param options  line options (and render options, used only when no `display` is supplied)
	 * @param display  block to draw into, default: a new display built from `options`
	 */
	constructor(
		readonly total: number,
		readonly lineOffset: number,
		options: ProgressOptions = {},
		display?: ProgressDisplay,
	) {
		this.display = display ?? new ProgressDisplay(options);
		this.#options = mergeLineOptions(options);
	}

	get count(): number {
		return this.#count;
	}

	get state(): LineState {
		return this.#state;
	}

	get options(): Readonly<Required<LineOptions>> {
		return this.#options;
	}

	advance(n = 1): void {
		this.setValue(this.#count + n);
	}

	setValue(value: number): void {
		if (this.#state !== 'active') return;
		this.#count = (isNaN(value) || (value < 0)) ? 0 : value;
		if (this.#count >= this.total) this.#state = 'finished';
		this.#draw();
	}

	finish(): void {
		if (this.#state !== 'active') return;
		this.#count = this.total;
		this.#state = 'finished';
		this.#draw();
	}

	cancel(): void {
		if (this.#state !== 'active') return;
		this.#state = 'cancelled';
		this.#draw();
	}

	/** Change line options (label, color, templates, ...) and redraw; the count is unchanged. */
	update(options: LineOptions): void {
		if (this.#state !== 'active') return;
		this.#options = mergeLineOptions(this.#options, options);
		this.#draw();
	}

	/** Current display text of the line. */
	render(): string {
		if (this.#options.clearOnComplete && (this.#state === 'finished')) return '';
		return renderLine(this.#count, this.total, this.#options, {
			elapsedMs: Date.now() - this.#startTime,
			state: this.#state,
			ttyColumns: this.display.ttyColumns,
		});
	}

	#draw(): void {
		if (!this.display.display) return;
		this.display.draw(this.lineOffset, this.render(), { force: this.#state !== 'active' });
	}
}
