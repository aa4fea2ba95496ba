import type { MessageSender } from './channel.ts';
import { ChannelClosedError } from './errors.ts';
import { type Logger, logger as defaultLogger } from './logger.ts';
import type { UpdateMessage, WorkerMessage } from './messages.ts';
import type { LineOptions } from './options.ts';

/** A worker's view of its own bar in a `MultipleProgress`.
 * * every call tags an update with the worker's id and sends it; no other state is kept
 * * the returned promises resolve once the update is queued (later, only if a bounded channel is full)
 * * updates sent after the coordinator has stopped are dropped
 */
export class WorkerHandle {
	readonly #sender: MessageSender<WorkerMessage>;
	readonly #logger: Logger;

	constructor(
		readonly id: number,
		readonly total: number,
		sender: MessageSender<WorkerMessage>,
		logger: Logger = defaultLogger,
	) {
		this.#sender = sender;
		this.#logger = logger;
	}

	next(): Promise<void> {
		return this.#send({ kind: 'next' });
	}

	/** `value` must be a whole number >= 0; anything else fails the coordinator. */
	setValue(value: number): Promise<void> {
		return this.#send({ kind: 'setValue', value });
	}

	finish(): Promise<void> {
		return this.#send({ kind: 'finish' });
	}

	cancel(): Promise<void> {
		return this.#send({ kind: 'cancel' });
	}

	/** Change this worker's line options (label, color, templates, ...). */
	update(options: LineOptions): Promise<void> {
		return this.#send({ kind: 'update', options });
	}

	#send(message: UpdateMessage): Promise<void> {
		return sendUnlessClosed(this.#sender, { workerId: this.id, message }, this.#logger);
	}
}

/** Send `message`, or drop it (logged at debug level) if the receiving coordinator has already stopped. */
export async function sendUnlessClosed<T>(
	sender: MessageSender<T>,
	message: T,
	logger: Logger,
): Promise<void> {
	if (!sender.closed) {
		try {
			await sender.send(message);
			return;
		} catch (error) {
			// * the coordinator stopped while this update was held back by a full channel
			if (!(error instanceof ChannelClosedError)) throw error;
		}
	}
	logger.debug({ update: message }, 'update after completion dropped');
}
