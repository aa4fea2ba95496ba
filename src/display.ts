import { consoleSize } from './lib/consoleSize.ts';
import { DEFAULT_RENDER_OPTIONS, type RenderOptions } from './options.ts';

// ANSI CSI sequences; ref: <https://en.wikipedia.org/wiki/ANSI_escape_code> @@ <https://archive.is/CUtrX>
export const ansiCSI = {
	clearEOL: '\x1b[0K',
	cursorUp: /* move cursor up {n} lines */ '\x1b[{n}A',
	hideCursor: '\x1b[?25l',
	showCursor: '\x1b[?25h',
};

type CursorPosition =
	| 'blockStart' // @ first character of first block line
	| 'blockEnd' // @ *first character past* final character of last block line
	| 'afterBlock' // start of line after block
;

export interface DrawOptions {
	/** render even if within `minUpdateInterval` of the prior render */
	force?: boolean;
}

// * cursor restoration for any display which hid it; registered once per process
const displaysHidingCursor = new Set<ProgressDisplay>();
let exitHookInstalled = false;
function installExitHook() {
	if (exitHookInstalled) return;
	exitHookInstalled = true;
	process.once('exit', () => {
		for (const display of displaysHidingCursor) display.restoreCursor();
	});
}

/** A block of terminal lines, addressed by line offset from the block's first line.
 * * lines are drawn by their owners (eg, trackers) via `draw()`; the whole block is rewritten on each render
 * * the block height is one more than the largest offset ever drawn; it never shrinks
 * * the cursor rests at the end of the block's last line between renders
 */
export class ProgressDisplay {
	readonly renderSettings: Readonly<Required<Omit<RenderOptions, 'ttyColumns'>>>;
	readonly ttyColumns: number;
	/** output is written (`enabled` and either a TTY writer or `displayAlways`) */
	readonly display: boolean;

	#lines: string[] = [];
	#priorHeight = 0;
	#priorRenderTime = 0;
	#pending = false;
	#completed = false;
	#cursorHidden = false;
	#cursorPosition: CursorPosition = 'blockStart';

	/**
	 * @param displayAlways  avoid TTY check on writer and always display progress, default: false
	 * @param enabled  write nothing at all when false, default: true
	 * @param hideCursor  hide cursor until progress display is complete, default: false
	 * @param minUpdateInterval  minimum time between renders in milliseconds, default: 20 ms
	 * @param ttyColumns  display width, default: writer's columns or console width or 80
	 * @param writer  output stream, default: `process.stderr`
	 */
	constructor({
		displayAlways = DEFAULT_RENDER_OPTIONS.displayAlways,
		enabled = DEFAULT_RENDER_OPTIONS.enabled,
		hideCursor = DEFAULT_RENDER_OPTIONS.hideCursor,
		minUpdateInterval = DEFAULT_RENDER_OPTIONS.minUpdateInterval,
		ttyColumns,
		writer = process.stderr,
	}: RenderOptions = {}) {
		this.renderSettings = { displayAlways, enabled, hideCursor, minUpdateInterval, writer };
		this.ttyColumns = ttyColumns ?? writer.columns ?? consoleSize(writer)?.columns ?? 80;
		this.display = enabled && (displayAlways || (writer.isTTY === true));
	}

	/** Number of lines rendered so far. */
	get height(): number {
		return this.#priorHeight;
	}

	get isCompleted(): boolean {
		return this.#completed;
	}

	/** Set the text of the line at `offset`, and render (subject to throttling). */
	draw(offset: number, text: string, { force = false }: DrawOptions = {}): void {
		if (this.#completed || !this.display) return;
		for (let idx = this.#lines.length; idx < offset; idx++) this.#lines[idx] = '';
		this.#lines[offset] = text;
		this.#pending = true;

		const now = Date.now();
		if (!force && ((now - this.#priorRenderTime) < this.renderSettings.minUpdateInterval)) return;
		this.#priorRenderTime = now;
		this.#render();
	}

	/** Finish the display: flush any throttled lines and move the cursor to the start of the line after the block.
	 * * `reserve` ~ lines below the first to step over, default: all rendered lines
	 */
	complete(reserve?: number): void {
		if (this.#completed) return;
		this.#completed = true;
		if (!this.display) return;
		if (this.#pending) this.#render();
		if (this.#priorHeight > 0) {
			this.#cursorToBlockStart();
			this.#cursorToNextLine(1 + (reserve ?? (this.#priorHeight - 1)));
			this.#cursorPosition = 'afterBlock';
		}
		this.restoreCursor();
	}

	/** Show the cursor if this display hid it. */
	restoreCursor(): void {
		if (!this.#cursorHidden) return;
		this.#cursorHidden = false;
		displaysHidingCursor.delete(this);
		this.#writeRaw(ansiCSI.showCursor);
	}

	#render(): void {
		this.#pending = false;
		this.#cursorToBlockStart();
		const lastLineToRender = this.#lines.length - 1;
		for (let idx = 0; idx < this.#lines.length; idx++) {
			this.#writeLine(this.#lines[idx]);
			if (idx != lastLineToRender) this.#cursorToNextLine();
		}
		this.#priorHeight = this.#lines.length;
		this.#cursorPosition = 'blockEnd';
	}

	#writeLine(msg?: string): void {
		if (this.renderSettings.hideCursor) this.#hideCursor();
		this.#cursorToLineStart();
		this.#writeRaw(`${msg ?? ''}${ansiCSI.clearEOL}`);
	}

	#writeRaw(msg: string) {
		this.renderSettings.writer.write(msg);
	}

	/** Move cursor to beginning of first block line */
	#cursorToBlockStart() {
		if (this.#cursorPosition == 'blockStart') return;
		if (this.#cursorPosition == 'afterBlock') this.#cursorUp();
		this.#cursorToLineStart();
		if (this.#priorHeight > 0) this.#cursorUp(this.#priorHeight - 1);
		this.#cursorPosition = 'blockStart';
	}

	/** Move cursor to beginning of current line */
	#cursorToLineStart() {
		this.#writeRaw('\r');
	}

	/** Move cursor to beginning of next line (scrolls screen if needed) */
	#cursorToNextLine(nLines = 1) {
		for (let i = 0; i < nLines; i++) {
			this.#writeRaw('\r\n');
		}
	}

	#cursorUp(nLines = 1) {
		if (nLines > 0) {
			this.#writeRaw(ansiCSI.cursorUp.replace('{n}', `${nLines}`));
		}
	}

	#hideCursor(): void {
		if (this.#cursorHidden) return;
		this.#cursorHidden = true;
		displaysHidingCursor.add(this);
		installExitHook();
		this.#writeRaw(ansiCSI.hideCursor);
	}
}
