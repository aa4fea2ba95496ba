// Progress from `worker_threads`: each thread gets one end of a `MessageChannel`; the main thread binds the other.
// * run with `npm run example:threads` (the worker threads load this same file through `tsx`)

import { isMainThread, MessageChannel, MessagePort, parentPort, Worker, workerData } from 'node:worker_threads';

import { bindPort, MultipleProgress, remoteWorker } from '../mod.ts';

type ThreadData = { port: MessagePort; workerId: number; total: number };

function isThreadData(data: unknown): data is ThreadData {
	return (typeof data === 'object') && (data !== null) &&
		('port' in data) && (data.port instanceof MessagePort) &&
		('workerId' in data) && (typeof data.workerId === 'number') &&
		('total' in data) && (typeof data.total === 'number');
}

if (isMainThread) {
	const lengths = [40, 25, 60, 35];
	const progress = new MultipleProgress(lengths, {
		label: 'all threads',
		workers: lengths.map((_, idx) => ({ label: `thread ${idx + 1}` })),
	});
	for (const [idx, total] of lengths.entries()) {
		const { port1, port2 } = new MessageChannel();
		bindPort(progress, port1);
		const worker = new Worker(new URL(import.meta.url), {
			execArgv: ['--import', 'tsx'],
			transferList: [port2],
			workerData: { port: port2, workerId: idx + 1, total },
		});
		worker.once('exit', () => port1.close());
	}
	await progress.join();
} else if (isThreadData(workerData)) {
	const { port, workerId, total } = workerData;
	const worker = remoteWorker(port, workerId, total);
	for (let i = 0; i < total; i++) {
		// * busy work; worker threads don't share the main thread's event loop
		const until = Date.now() + 20 + Math.random() * 60;
		while (Date.now() < until);
		await worker.next();
	}
	port.close();
	parentPort?.close();
}
