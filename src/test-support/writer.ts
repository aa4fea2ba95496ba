import type { ProgressWriter } from '../options.ts';

/** An in-memory "terminal" collecting everything written to it. */
export class CaptureWriter implements ProgressWriter {
	readonly chunks: string[] = [];
	isTTY = true;
	columns = 80;

	write(chunk: string): boolean {
		this.chunks.push(chunk);
		return true;
	}

	get output(): string {
		return this.chunks.join('');
	}
}

/** Wait until every queued microtask (eg, a consumer loop draining its channel) has run. */
export function settle(): Promise<void> {
	return new Promise((resolve) => setImmediate(resolve));
}
