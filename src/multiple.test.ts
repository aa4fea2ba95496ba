import { describe, expect, it } from 'vitest';

import { ansiCSI } from './display.ts';
import { ConfigurationError, ProtocolViolationError } from './errors.ts';
import { MultipleProgress } from './multiple.ts';
import { CaptureWriter, settle } from './test-support/writer.ts';

const hidden = { enabled: false, ttyColumns: 80 };

describe('MultipleProgress', () => {
	it('numbers workers from 1 and sums their lengths into the aggregate', () => {
		const progress = new MultipleProgress([3, 2], hidden);
		expect(progress.amount).toBe(2);
		expect(progress.handles.map((handle) => [handle.id, handle.total])).toEqual([[1, 3], [2, 2]]);
		expect(progress.worker(2)).toBe(progress.handles[1]);
		expect(progress.aggregate.total).toBe(5);
		expect(progress.aggregate.lineOffset).toBe(0);
	});

	it('accepts an amount of equal-length workers', () => {
		const progress = new MultipleProgress(3, 2, hidden);
		expect(progress.lengths).toEqual([2, 2, 2]);
		expect(progress.aggregate.total).toBe(6);
	});

	it('reuses a finished worker line for the next worker', async () => {
		const progress = new MultipleProgress([3, 2], hidden);
		for (let idx = 0; idx < 3; idx++) await progress.worker(1).next();
		await settle();
		expect(progress.workerState(1)).toEqual({
			id: 1,
			total: 3,
			count: 3,
			offset: 1,
			materialized: true,
			finished: true,
		});
		expect(progress.offsetsInUse).toEqual([]);

		await progress.worker(2).next();
		await settle();
		expect(progress.workerState(2).offset).toBe(1);
		await progress.worker(2).next();
		await progress.join();
		expect(progress.aggregate.count).toBe(5);
		expect(progress.aggregate.state).toBe('finished');
		expect(progress.highWaterOffset).toBe(1);
	});

	it('gives concurrently active workers distinct lines', async () => {
		const progress = new MultipleProgress([3, 2], hidden);
		await progress.worker(1).next();
		await progress.worker(2).next();
		await settle();
		expect(progress.offsetsInUse).toEqual([1, 2]);
		expect(progress.aggregate.count).toBe(2);

		await progress.worker(1).next();
		await progress.worker(1).next();
		await settle();
		expect(progress.offsetsInUse).toEqual([2]);

		await progress.worker(2).next();
		await progress.join();
		expect(progress.aggregate.count).toBe(5);
		expect(progress.highWaterOffset).toBe(2);
	});

	it('stops with a cancelled aggregate once every worker is finished short of the total', async () => {
		const progress = new MultipleProgress([3, 2], hidden);
		let stopped = false;
		void progress.done.then(() => {
			stopped = true;
		});
		const first = progress.worker(1);
		await first.next();
		await first.next();
		await first.cancel();
		await settle();
		expect(progress.workerState(1).finished).toBe(true);
		expect(progress.workerState(1).count).toBe(2);
		expect(progress.aggregate.count).toBe(2);
		expect(progress.offsetsInUse).toEqual([]);
		expect(stopped).toBe(false);

		const second = progress.worker(2);
		await second.next();
		await second.next();
		await progress.join();
		expect(progress.aggregate.count).toBe(4);
		expect(progress.aggregate.state).toBe('cancelled');
	});

	it('clamps a worker value to its total', async () => {
		const progress = new MultipleProgress([3, 2], hidden);
		await progress.worker(1).setValue(10);
		await settle();
		expect(progress.workerState(1).count).toBe(3);
		expect(progress.aggregate.count).toBe(3);
	});

	it('moves the aggregate by the change of a worker value, in either direction', async () => {
		const progress = new MultipleProgress([4, 4], hidden);
		await progress.worker(1).setValue(3);
		await progress.worker(1).setValue(1);
		await settle();
		expect(progress.aggregate.count).toBe(1);
	});

	it('ignores updates for a finished worker', async () => {
		const progress = new MultipleProgress([2, 2], hidden);
		await progress.worker(1).finish();
		await progress.worker(1).finish();
		await settle();
		expect(progress.aggregate.count).toBe(2);
		await progress.worker(1).next();
		await progress.worker(1).setValue(0);
		await settle();
		expect(progress.workerState(1).count).toBe(2);
		expect(progress.aggregate.count).toBe(2);
	});

	it('ends with an exactly finished aggregate after workers move back and forth', async () => {
		const progress = new MultipleProgress([3, 3], hidden);
		await progress.worker(1).setValue(1);
		await progress.worker(2).setValue(2);
		await progress.worker(1).setValue(0);
		await progress.worker(2).setValue(3);
		await progress.worker(1).finish();
		await progress.join();
		expect(progress.aggregate.count).toBe(6);
		expect(progress.aggregate.state).toBe('finished');
	});

	it('fails on a worker value that is not a whole number >= 0', async () => {
		for (const value of [1.1, -1]) {
			const progress = new MultipleProgress([3, 3], hidden);
			const failed = expect(progress.done).rejects.toBeInstanceOf(ProtocolViolationError);
			await progress.worker(1).setValue(value);
			await failed;
			expect(progress.workerState(1).materialized).toBe(false);
			expect(progress.aggregate.count).toBe(0);
			expect(progress.aggregate.state).toBe('cancelled');
		}
	});

	it('gives a worker its line on its first update, even one changing only options', async () => {
		const progress = new MultipleProgress([2], hidden);
		expect(progress.workerState(1).materialized).toBe(false);
		await progress.worker(1).update({ label: 'renamed' });
		await settle();
		expect(progress.workerState(1)).toEqual({
			id: 1,
			total: 2,
			count: 0,
			offset: 1,
			materialized: true,
			finished: false,
		});
	});

	it('rejects an unknown worker id', async () => {
		const progress = new MultipleProgress([1, 1], hidden);
		expect(() => progress.worker(0)).toThrow(ProtocolViolationError);
		expect(() => progress.worker(3)).toThrow(ProtocolViolationError);
		expect(() => progress.workerState(1.5)).toThrow(ProtocolViolationError);

		const failed = expect(progress.done).rejects.toBeInstanceOf(ProtocolViolationError);
		await progress.dispatch({ workerId: 3, message: { kind: 'next' } });
		await failed;
		await expect(progress.worker(1).next()).resolves.toBeUndefined();
	});

	it('routes dispatched messages like handle updates', async () => {
		const progress = new MultipleProgress([1, 1], hidden);
		await progress.dispatch({ workerId: 2, message: { kind: 'next' } });
		await settle();
		expect(progress.workerState(2).count).toBe(1);
		expect(progress.workerState(1).materialized).toBe(false);
	});

	it('rejects invalid construction arguments', () => {
		expect(() => new MultipleProgress([1, -1], hidden)).toThrow(ConfigurationError);
		expect(() => new MultipleProgress([1, 2], { ...hidden, workers: [{ label: 'only one' }] })).toThrow(
			ConfigurationError,
		);
		expect(() => new MultipleProgress(-2, 1, hidden)).toThrow(ConfigurationError);
		expect(() => new MultipleProgress([1], { ...hidden, capacity: 0 })).toThrow(ConfigurationError);
	});

	it('never gives a zero-length worker a line', async () => {
		const progress = new MultipleProgress([0, 2], hidden);
		expect(progress.workerState(1)).toEqual({
			id: 1,
			total: 0,
			count: 0,
			offset: undefined,
			materialized: false,
			finished: true,
		});
		await progress.worker(1).next();
		await progress.worker(2).next();
		await progress.worker(2).next();
		await progress.join();
		expect(progress.workerState(1).materialized).toBe(false);
		expect(progress.workerState(2).offset).toBe(1);
		expect(progress.aggregate.state).toBe('finished');
	});

	it('completes immediately when there is nothing to do', async () => {
		const progress = new MultipleProgress([0, 0], hidden);
		await progress.join();
		expect(progress.aggregate.state).toBe('finished');
		expect(progress.highWaterOffset).toBe(0);
	});

	it('drops updates sent after it stopped', async () => {
		const progress = new MultipleProgress([1], hidden);
		await progress.worker(1).next();
		await progress.join();
		await expect(progress.worker(1).next()).resolves.toBeUndefined();
		expect(progress.aggregate.count).toBe(1);
	});

	it('finishes every worker', async () => {
		const progress = new MultipleProgress([2, 3], hidden);
		await progress.worker(2).next();
		await progress.finish();
		await progress.join();
		expect(progress.aggregate.count).toBe(5);
		expect(progress.aggregate.state).toBe('finished');
		expect([1, 2].map((id) => progress.workerState(id).count)).toEqual([2, 3]);
	});

	it('cancels every worker', async () => {
		const progress = new MultipleProgress([2, 3], hidden);
		await progress.worker(2).next();
		await progress.cancel();
		await progress.join();
		expect(progress.aggregate.count).toBe(1);
		expect(progress.aggregate.state).toBe('cancelled');
		expect(progress.offsetsInUse).toEqual([]);
	});

	it('counts exactly one step per `next()` across interleaved workers', async () => {
		const lengths = [4, 3, 5];
		const progress = new MultipleProgress(lengths, { ...hidden, capacity: 2 });
		await Promise.all(
			progress.handles.map(async (handle) => {
				for (let idx = 0; idx < handle.total; idx++) {
					if ((idx + handle.id) % 2 === 0) await settle();
					await handle.next();
				}
			}),
		);
		await progress.join();
		expect(progress.aggregate.count).toBe(12);
		expect(lengths.map((_, idx) => progress.workerState(idx + 1).count)).toEqual(lengths);
		expect(progress.offsetsInUse).toEqual([]);
	});

	it('draws each worker with its own options over the shared ones', async () => {
		const writer = new CaptureWriter();
		const progress = new MultipleProgress([1], {
			writer,
			displayAlways: true,
			minUpdateInterval: 0,
			ttyColumns: 80,
			label: 'all',
			progressTemplate: '{label}{value}',
			workers: [{ label: 'a' }],
		});
		await progress.worker(1).next();
		await progress.join();
		const EOL = ansiCSI.clearEOL;
		expect(writer.output).toBe(
			`\r${EOL}\r\n\ra1${EOL}` +
				`\r\x1b[1A\rall1${EOL}\r\n\ra1${EOL}` +
				'\r\x1b[1A\r\n\r\n',
		);
	});
});
