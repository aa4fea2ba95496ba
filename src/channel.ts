import { ChannelClosedError } from './errors.ts';

/** The producer side of a channel; all a `WorkerHandle` needs. */
export interface MessageSender<T> {
	readonly closed: boolean;
	send(message: T): Promise<void>;
}

type PendingSend<T> = {
	message: T;
	resolve: () => void;
	reject: (error: Error) => void;
};

/** An ordered multi-producer/single-consumer queue.
 * * `send()` may be called by any number of producers; each producer's messages keep their order
 * * a bounded channel (`capacity`) holds back senders in arrival order until the consumer drains
 * * `receive()` waits for the next message; it yields `undefined` once closed and drained
 */
export class UpdateChannel<T> implements MessageSender<T>, AsyncIterable<T> {
	#buffer: T[] = [];
	#senders: PendingSend<T>[] = [];
	#receivers: ((message: T | undefined) => void)[] = [];
	#closed = false;

	constructor(readonly capacity = Infinity) {
		if (!(capacity > 0)) throw new RangeError(`progress: channel capacity must be positive (got ${capacity})`);
	}

	get closed(): boolean {
		return this.#closed;
	}

	/** Number of messages waiting for the consumer (buffered plus held-back senders). */
	get size(): number {
		return this.#buffer.length + this.#senders.length;
	}

	/** Enqueue `message`; resolves once it is in the buffer (immediately, unless the channel is full). */
	send(message: T): Promise<void> {
		if (this.#closed) return Promise.reject(new ChannelClosedError());
		const receiver = this.#receivers.shift();
		if (receiver != null) {
			receiver(message);
			return Promise.resolve();
		}
		if ((this.#senders.length === 0) && (this.#buffer.length < this.capacity)) {
			this.#buffer.push(message);
			return Promise.resolve();
		}
		return new Promise<void>((resolve, reject) => {
			this.#senders.push({ message, resolve, reject });
		});
	}

	/** Take the next message, waiting for one if needed; `undefined` once closed and empty. */
	receive(): Promise<T | undefined> {
		if (this.#buffer.length > 0) {
			const message = this.#buffer.shift();
			this.#admitSender();
			return Promise.resolve(message);
		}
		const sender = this.#senders.shift();
		if (sender != null) {
			sender.resolve();
			return Promise.resolve(sender.message);
		}
		if (this.#closed) return Promise.resolve(undefined);
		return new Promise((resolve) => {
			this.#receivers.push(resolve);
		});
	}

	/** Stop accepting messages; buffered messages remain receivable, held-back senders are rejected. */
	close(): void {
		if (this.#closed) return;
		this.#closed = true;
		for (const sender of this.#senders.splice(0)) sender.reject(new ChannelClosedError());
		for (const receiver of this.#receivers.splice(0)) receiver(undefined);
	}

	async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
		for (;;) {
			const message = await this.receive();
			if (message === undefined) return;
			yield message;
		}
	}

	#admitSender(): void {
		const sender = this.#senders.shift();
		if (sender == null) return;
		this.#buffer.push(sender.message);
		sender.resolve();
	}
}
