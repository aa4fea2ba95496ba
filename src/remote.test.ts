import { MessageChannel, type MessagePort } from 'node:worker_threads';

import { afterEach, describe, expect, it } from 'vitest';

import { ProtocolViolationError } from './errors.ts';
import { parseWorkerMessage } from './messages.ts';
import { MultipleProgress } from './multiple.ts';
import { bindPort, type PortLike, PortSender, remoteWorker } from './remote.ts';
import { settle } from './test-support/writer.ts';

const hidden = { enabled: false, ttyColumns: 80 };

// * a port whose far end is the test itself
class FakePort implements PortLike {
	readonly posted: unknown[] = [];
	readonly messageListeners = new Set<(value: unknown) => void>();

	postMessage(value: unknown): void {
		this.posted.push(value);
	}

	on(event: 'close', listener: () => void): this;
	on(event: 'message', listener: (value: unknown) => void): this;
	on(event: 'close' | 'message', listener: (value: unknown) => void): this {
		if (event === 'message') this.messageListeners.add(listener);
		return this;
	}

	off(_event: 'message', listener: (value: unknown) => void): this {
		this.messageListeners.delete(listener);
		return this;
	}

	deliver(value: unknown): void {
		for (const listener of this.messageListeners) listener(value);
	}
}

describe('parseWorkerMessage', () => {
	it('accepts well-formed messages', () => {
		expect(parseWorkerMessage({ workerId: 2, message: { kind: 'setValue', value: 3 } })).toEqual({
			workerId: 2,
			message: { kind: 'setValue', value: 3 },
		});
		expect(parseWorkerMessage({ workerId: 1, message: { kind: 'update', options: { color: 'green' } } })).toEqual({
			workerId: 1,
			message: { kind: 'update', options: { color: 'green' } },
		});
	});

	it('rejects anything else', () => {
		const malformed: unknown[] = [
			null,
			'next',
			{ workerId: '1', message: { kind: 'next' } },
			{ workerId: 1.5, message: { kind: 'next' } },
			{ workerId: 1, message: { kind: 'jump' } },
			{ workerId: 1, message: { kind: 'setValue', value: -1 } },
			{ workerId: 1, message: { kind: 'setValue', value: 1.5 } },
			{ workerId: 1, message: { kind: 'update', options: { color: 'plaid' } } },
			{ workerId: 1, message: { kind: 'update', options: { writer: 'stdout' } } },
		];
		for (const data of malformed) {
			expect(() => parseWorkerMessage(data)).toThrow(ProtocolViolationError);
		}
	});
});

describe('bindPort', () => {
	it('feeds port messages into the coordinator and detaches once it stops', async () => {
		const port = new FakePort();
		const progress = new MultipleProgress([2], hidden);
		bindPort(progress, port);
		expect(port.messageListeners.size).toBe(1);

		port.deliver({ workerId: 1, message: { kind: 'next' } });
		port.deliver({ workerId: 1, message: { kind: 'setValue', value: 2 } });
		await progress.join();
		await settle();
		expect(progress.aggregate.count).toBe(2);
		expect(port.messageListeners.size).toBe(0);
	});

	it('rethrows malformed payloads from the listener', () => {
		const port = new FakePort();
		const progress = new MultipleProgress([1], hidden);
		bindPort(progress, port);
		expect(() => port.deliver({ workerId: 1, message: { kind: 'skip' } })).toThrow(ProtocolViolationError);
	});

	it('detaches on request', () => {
		const port = new FakePort();
		const detach = bindPort(new MultipleProgress([1], hidden), port);
		detach();
		expect(port.messageListeners.size).toBe(0);
	});
});

describe('remoteWorker', () => {
	it('posts tagged updates', async () => {
		const port = new FakePort();
		const worker = remoteWorker(port, 3, 10);
		await worker.next();
		await worker.setValue(4);
		expect(port.posted).toEqual([
			{ workerId: 3, message: { kind: 'next' } },
			{ workerId: 3, message: { kind: 'setValue', value: 4 } },
		]);
	});
});

describe('across a MessageChannel', () => {
	let ports: MessagePort[] = [];

	afterEach(() => {
		for (const port of ports) port.close();
		ports = [];
	});

	it('drives a coordinator from the other end of the channel', async () => {
		const { port1, port2 } = new MessageChannel();
		ports = [port1, port2];
		const progress = new MultipleProgress([2, 1], hidden);
		bindPort(progress, port1);

		const first = remoteWorker(port2, 1, 2);
		const second = remoteWorker(port2, 2, 1);
		await first.next();
		await second.finish();
		await first.next();
		await progress.join();
		expect(progress.aggregate.count).toBe(3);
		expect(progress.aggregate.state).toBe('finished');
	});

	it('fails the coordinator on an update for an unknown worker', async () => {
		const { port1, port2 } = new MessageChannel();
		ports = [port1, port2];
		const progress = new MultipleProgress([1], hidden);
		const failed = expect(progress.done).rejects.toBeInstanceOf(ProtocolViolationError);
		bindPort(progress, port1);
		await remoteWorker(port2, 5, 1).next();
		await failed;
	});

	it('reports a closed port as a closed sender', async () => {
		const { port1, port2 } = new MessageChannel();
		ports = [port1, port2];
		const sender = new PortSender(port2);
		const closed = new Promise<void>((resolve) => port2.on('close', () => resolve()));
		expect(sender.closed).toBe(false);
		port1.close();
		await closed;
		expect(sender.closed).toBe(true);
	});
});
