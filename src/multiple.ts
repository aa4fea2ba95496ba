import { UpdateChannel } from './channel.ts';
import { ProgressDisplay } from './display.ts';
import { ProtocolViolationError } from './errors.ts';
import { sendUnlessClosed, WorkerHandle } from './handle.ts';
import { OffsetPool } from './lib/offsetPool.ts';
import { type Logger, logger as defaultLogger } from './logger.ts';
import { isCount, type UpdateMessage, type WorkerMessage } from './messages.ts';
import {
	type CoordinatorOptions,
	type LineOptions,
	mergeLineOptions,
	type ProgressOptions,
	validateCoordinatorArgs,
} from './options.ts';
import { Tracker } from './tracker.ts';

export interface MultipleProgressOptions extends CoordinatorOptions {
	/** per-worker line options, overriding the shared ones; one entry per worker */
	workers?: (LineOptions | undefined)[];
}

/** Read-only view of one worker's bookkeeping. */
export interface WorkerSnapshot {
	id: number;
	total: number;
	count: number;
	offset: number | undefined;
	materialized: boolean;
	finished: boolean;
}

// * owned by the consumer loop alone; never touched by producers
interface WorkerState {
	tracker: Tracker | undefined;
	offset: number | undefined;
	finished: boolean;
}

/** One progress bar per worker plus an aggregate bar, fed by any number of concurrent workers.
 * * workers send tagged updates through their `WorkerHandle`; a single consumer loop applies them
 * * a worker's bar gets a display line (offset) on its first update, the smallest one free at that moment,
 *   and gives it back when the worker reaches its total (or is cancelled)
 * * the aggregate bar (offset 0) always shows the sum of the worker bars
 * * the loop stops once the aggregate is complete or every worker is finished
 *
 * ```ts
 * const progress = new MultipleProgress([3, 5, 2], { label: 'total', workers: [{ label: 'a' }, { label: 'b' }, { label: 'c' }] });
 * await Promise.all(progress.handles.map(async (worker) => { for (...) { await step(); await worker.next(); } }));
 * await progress.join();
 * ```
 *
 * Worker ids run from 1 to `amount`. A worker that stops sending updates before its total keeps its line (and the
 * coordinator running) indefinitely; there are no timeouts.
 */
export class MultipleProgress {
	readonly lengths: readonly number[];
	readonly aggregate: Tracker;
	readonly handles: readonly WorkerHandle[];
	/** settles when the consumer loop has stopped; rejects on a protocol violation (unknown worker, invalid value) */
	readonly done: Promise<void>;

	readonly #channel: UpdateChannel<WorkerMessage>;
	readonly #display: ProgressDisplay;
	readonly #workers: WorkerState[];
	readonly #workerOptions: (LineOptions | undefined)[];
	readonly #sharedOptions: ProgressOptions;
	readonly #offsets = new OffsetPool(1);
	readonly #logger: Logger;

	/**
	 * @param lengths  total of each worker's bar
	 */
	constructor(lengths: readonly number[], options?: MultipleProgressOptions);
	/**
	 * @param amount  number of workers
	 * @param length  total of every worker's bar
	 */
	constructor(amount: number, length: number, options?: MultipleProgressOptions);
	constructor(
		lengthsOrAmount: readonly number[] | number,
		lengthOrOptions?: number | MultipleProgressOptions,
		options_?: MultipleProgressOptions,
	) {
		const lengths = resolveLengths(lengthsOrAmount, lengthOrOptions);
		const { capacity, logger, workers, ...shared } = (typeof lengthOrOptions === 'object')
			? lengthOrOptions
			: (options_ ?? {});
		validateCoordinatorArgs({
			capacity,
			lengths,
			minUpdateInterval: shared.minUpdateInterval,
			workerOptionCount: workers?.length,
		});

		this.lengths = lengths;
		this.#logger = (logger ?? defaultLogger).child({ component: 'MultipleProgress' });
		this.#sharedOptions = shared;
		this.#workerOptions = workers ?? [];
		this.#channel = new UpdateChannel(capacity);
		this.#display = new ProgressDisplay(shared);
		this.aggregate = new Tracker(sum(lengths), 0, shared, this.#display);
		// * zero-length workers are complete from the start and never take a line
		this.#workers = lengths.map((length) => ({ tracker: undefined, offset: undefined, finished: length === 0 }));
		this.handles = lengths.map((length, idx) => new WorkerHandle(idx + 1, length, this.#channel, this.#logger));
		this.done = this.#consume();
	}

	/** Number of workers. */
	get amount(): number {
		return this.lengths.length;
	}

	/** Line offsets held by unfinished workers, ascending. */
	get offsetsInUse(): number[] {
		return this.#offsets.inUse;
	}

	/** Largest line offset ever assigned to a worker (0 if none). */
	get highWaterOffset(): number {
		return this.#offsets.highWater;
	}

	/** The handle of worker `id` (1-based).
	 * @throws {ProtocolViolationError} for an id outside `[1, amount]`
	 */
	worker(id: number): WorkerHandle {
		this.#assertWorkerId(id);
		return this.handles[id - 1];
	}

	workerState(id: number): WorkerSnapshot {
		this.#assertWorkerId(id);
		const { tracker, offset, finished } = this.#workers[id - 1];
		return {
			id,
			total: this.lengths[id - 1],
			count: tracker?.count ?? 0,
			offset,
			materialized: tracker != null,
			finished,
		};
	}

	/** Queue `message` as if sent by the handle of worker `message.workerId` (eg, a message relayed from another thread).
	 * * an unknown worker id fails the consumer loop (`done` rejects)
	 */
	dispatch(message: WorkerMessage): Promise<void> {
		return sendUnlessClosed(this.#channel, message, this.#logger);
	}

	/** Finish every worker's bar (each unfinished worker jumps to its total). */
	async finish(): Promise<void> {
		await Promise.all(this.handles.map((handle) => handle.finish()));
	}

	/** Cancel every unfinished worker's bar. */
	async cancel(): Promise<void> {
		await Promise.all(this.handles.map((handle) => handle.cancel()));
	}

	/** Wait for the consumer loop to stop (ie, for the final display). */
	join(): Promise<void> {
		return this.done;
	}

	//=== consumer loop (the single writer of all state below)

	async #consume(): Promise<void> {
		try {
			while (!this.#isComplete()) {
				const received = await this.#channel.receive();
				if (received === undefined) break;
				this.#apply(received);
			}
		} finally {
			this.#channel.close();
			// * stopping short of the total (every worker finished, some by cancellation) cancels the aggregate
			if (this.aggregate.count < this.aggregate.total) this.aggregate.cancel();
			else this.aggregate.finish();
			// * from the aggregate line, step past every worker line ever used
			this.#display.complete(this.#offsets.highWater);
			this.#logger.info(
				{ count: this.aggregate.count, total: this.aggregate.total, lines: this.#offsets.highWater + 1 },
				'progress complete',
			);
		}
	}

	#isComplete(): boolean {
		return (this.aggregate.count >= this.aggregate.total) || this.#workers.every((worker) => worker.finished);
	}

	#apply({ workerId, message }: WorkerMessage): void {
		if (!this.#isWorkerId(workerId)) {
			this.#logger.error({ workerId, kind: message.kind }, 'update for unknown worker');
			throw new ProtocolViolationError(`no worker ${workerId} (of ${this.amount})`, workerId);
		}
		if ((message.kind === 'setValue') && !isCount(message.value)) {
			this.#logger.error({ workerId, value: message.value }, 'invalid value for worker');
			throw new ProtocolViolationError(
				`value ${message.value} for worker ${workerId} is not a whole number >= 0`,
				workerId,
			);
		}
		const worker = this.#workers[workerId - 1];
		if (worker.finished) {
			this.#logger.debug({ workerId, kind: message.kind }, 'update for finished worker ignored');
			return;
		}

		const tracker = worker.tracker ?? this.#materialize(workerId, worker);
		const previousCount = tracker.count;
		applyMessage(tracker, message);

		const delta = tracker.count - previousCount;
		if (delta !== 0) this.aggregate.setValue(this.aggregate.count + delta);

		if ((tracker.state !== 'active') || (tracker.count >= tracker.total)) {
			worker.finished = true;
			if (worker.offset !== undefined) this.#offsets.release(worker.offset);
			this.#logger.debug({ workerId, offset: worker.offset, state: tracker.state }, 'worker line released');
		}
	}

	#materialize(workerId: number, worker: WorkerState): Tracker {
		const offset = this.#offsets.acquire();
		const tracker = new Tracker(
			this.lengths[workerId - 1],
			offset,
			mergeLineOptions(this.#sharedOptions, this.#workerOptions[workerId - 1]),
			this.#display,
		);
		worker.tracker = tracker;
		worker.offset = offset;
		this.#logger.debug({ workerId, offset }, 'worker line assigned');
		return tracker;
	}

	#isWorkerId(id: number): boolean {
		return Number.isInteger(id) && (id >= 1) && (id <= this.amount);
	}

	#assertWorkerId(id: number): void {
		if (!this.#isWorkerId(id)) throw new ProtocolViolationError(`no worker ${id} (of ${this.amount})`, id);
	}
}

/** Apply one update to a worker's bar; overshooting values are clamped to the bar's total. */
function applyMessage(tracker: Tracker, message: UpdateMessage): void {
	switch (message.kind) {
		case 'next':
			tracker.advance();
			break;
		case 'setValue':
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

function resolveLengths(
	lengthsOrAmount: readonly number[] | number,
	lengthOrOptions: number | MultipleProgressOptions | undefined,
): number[] {
	if (typeof lengthsOrAmount !== 'number') return [...lengthsOrAmount];
	const length = (typeof lengthOrOptions === 'number') ? lengthOrOptions : 0;
	validateCoordinatorArgs({ amount: lengthsOrAmount, lengths: [length] });
	return new Array<number>(lengthsOrAmount).fill(length);
}

function sum(ns: readonly number[]): number {
	return ns.reduce((total, n) => total + n, 0);
}
