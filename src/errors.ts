/** Errors raised by the progress coordinators.
 * * construction-time misconfiguration is the only class surfaced synchronously to callers
 * * runtime protocol violations reject the coordinator's `done` promise
 */

/** Mismatched or invalid construction arguments (eg, `lengths` vs per-worker options). */
export class ConfigurationError extends Error {
	readonly name = 'ConfigurationError';

	/**
	 * @param details ~ one entry per rejected argument
	 */
	constructor(readonly details: string[]) {
		super(`progress: invalid configuration: ${details.join('; ')}`);
	}
}

/** A message the consumer loop cannot apply (unknown worker id, malformed remote payload). */
export class ProtocolViolationError extends Error {
	readonly name = 'ProtocolViolationError';

	constructor(message: string, readonly workerId?: number) {
		super(`progress: protocol violation: ${message}`);
	}
}

/** `send()` on a channel after `close()`. */
export class ChannelClosedError extends Error {
	readonly name = 'ChannelClosedError';

	constructor() {
		super('progress: update channel is closed');
	}
}
