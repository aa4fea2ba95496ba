// Carry worker updates across a `worker_threads` boundary.
// * worker thread: `remoteWorker(port, id, total)` ~ a `WorkerHandle` which posts to `port`
// * main thread: `bindPort(progress, port)` ~ feeds messages from the other end of the channel into the coordinator

import type { MessageSender } from './channel.ts';
import { WorkerHandle } from './handle.ts';
import { type Logger, logger as defaultLogger } from './logger.ts';
import { parseWorkerMessage, type WorkerMessage } from './messages.ts';
import type { MultipleProgress } from './multiple.ts';

/** The part of a `MessagePort` (from `node:worker_threads`) used here. */
export interface PortLike {
	postMessage(value: unknown): void;
	on(event: 'close', listener: () => void): unknown;
	on(event: 'message', listener: (value: unknown) => void): unknown;
	off(event: 'message', listener: (value: unknown) => void): unknown;
}

/** Sends worker messages through a port; "closed" once the port is. */
export class PortSender implements MessageSender<WorkerMessage> {
	#closed = false;

	constructor(readonly port: PortLike) {
		port.on('close', () => {
			this.#closed = true;
		});
	}

	get closed(): boolean {
		return this.#closed;
	}

	send(message: WorkerMessage): Promise<void> {
		this.port.postMessage(message);
		return Promise.resolve();
	}
}

/** A handle for worker `workerId` of a coordinator on the far side of `port`. */
export function remoteWorker(port: PortLike, workerId: number, total: number, logger?: Logger): WorkerHandle {
	return new WorkerHandle(workerId, total, new PortSender(port), logger);
}

/** Feed worker messages arriving on `port` into `progress`, until it stops.
 * * messages keep the order in which the port delivers them
 * * a payload that isn't a well-formed worker message is a caller bug: it is logged and rethrown from the port's
 *   'message' listener (surfacing as an uncaught exception)
 * * a well-formed message for an unknown worker fails the coordinator (`progress.done` rejects)
 * @returns a function which detaches the port early
 */
export function bindPort(progress: MultipleProgress, port: PortLike, logger: Logger = defaultLogger): () => void {
	const onMessage = (data: unknown) => {
		let message: WorkerMessage;
		try {
			message = parseWorkerMessage(data);
		} catch (error) {
			logger.error({ err: error }, 'malformed message on worker port');
			throw error;
		}
		// * `dispatch()` drops (never rejects) once the coordinator has stopped
		void progress.dispatch(message);
	};
	const detach = () => {
		port.off('message', onMessage);
	};
	port.on('message', onMessage);
	void progress.done.then(detach, detach);
	return detach;
}
