import { UpdateChannel } from './channel.ts';
import { ProtocolViolationError } from './errors.ts';
import { sendUnlessClosed } from './handle.ts';
import { type Logger, logger as defaultLogger } from './logger.ts';
import { isCount, type UpdateMessage } from './messages.ts';
import { type CoordinatorOptions, type LineOptions, validateCoordinatorArgs } from './options.ts';
import { Tracker } from './tracker.ts';

export interface ParallelProgressOptions extends CoordinatorOptions {
	/** display line of the bar, default: 0 */
	offset?: number;
}

/** A single progress bar which may be advanced from any number of concurrent producers.
 * * producers only enqueue updates; one consumer loop applies them to the bar, in order
 * * the loop stops when the bar reaches its total, or on `finish()`/`cancel()`
 *
 * ```ts
 * const progress = new ParallelProgress(10, { label: 'test' });
 * await Promise.all(items.map(async (item) => { await work(item); await progress.next(); }));
 * await progress.join();
 * ```
 */
export class ParallelProgress {
	readonly tracker: Tracker;
	/** settles when the consumer loop has stopped; rejects on a `setValue()` that isn't a whole number >= 0 */
	readonly done: Promise<void>;
	readonly #channel: UpdateChannel<UpdateMessage>;
	readonly #logger: Logger;

	constructor(total: number, { capacity, logger, offset = 0, ...options }: ParallelProgressOptions = {}) {
		validateCoordinatorArgs({ capacity, lengths: [total], minUpdateInterval: options.minUpdateInterval, offset });
		this.#logger = (logger ?? defaultLogger).child({ component: 'ParallelProgress' });
		this.#channel = new UpdateChannel(capacity);
		this.tracker = new Tracker(total, offset, options);
		this.done = this.#consume();
	}

	next(): Promise<void> {
		return this.#send({ kind: 'next' });
	}

	setValue(value: number): Promise<void> {
		return this.#send({ kind: 'setValue', value });
	}

	finish(): Promise<void> {
		return this.#send({ kind: 'finish' });
	}

	cancel(): Promise<void> {
		return this.#send({ kind: 'cancel' });
	}

	/** Change the bar's line options (label, color, templates, ...). */
	update(options: LineOptions): Promise<void> {
		return this.#send({ kind: 'update', options });
	}

	/** Wait for the consumer loop to stop (ie, for the bar's final display). */
	join(): Promise<void> {
		return this.done;
	}

	#send(message: UpdateMessage): Promise<void> {
		return sendUnlessClosed(this.#channel, message, this.#logger);
	}

	async #consume(): Promise<void> {
		const tracker = this.tracker;
		try {
			if (tracker.total === 0) tracker.finish();
			while ((tracker.state === 'active') && (tracker.count < tracker.total)) {
				const message = await this.#channel.receive();
				if (message === undefined) break;
				switch (message.kind) {
					case 'next':
						tracker.advance();
						break;
					case 'setValue':
						if (!isCount(message.value)) {
							this.#logger.error({ value: message.value }, 'invalid value');
							throw new ProtocolViolationError(`value ${message.value} is not a whole number >= 0`);
						}
						tracker.setValue(Math.min(message.value, tracker.total));
						break;
					case 'finish':
						tracker.finish();
						break;
					case 'cancel':
						tracker.cancel();
						break;
					case 'update':
						tracker.update(message.options);
						break;
				}
			}
		} finally {
			this.#channel.close();
			tracker.display.complete();
			this.#logger.info({ count: tracker.count, total: tracker.total, state: tracker.state }, 'progress complete');
		}
	}
}
