// ref: [mpb (`go`)](https://github.com/vbauerster/mpb)
// ref: [multibar (`go`)](https://github.com/sethgrid/multibar) // spell-checker:ignore multibar
// ref: [](https://www.npmjs.com/package/cli-progress)
// ref: [](https://www.npmjs.com/package/multi-progress)
// ref: [](https://www.npmjs.com/package/multi-progress-bars)

// ToDO: add a `log()` passthrough (message above the block) routed through the coordinators' channels

export { MultipleProgress, type MultipleProgressOptions, type WorkerSnapshot } from './src/multiple.ts';
export { ParallelProgress, type ParallelProgressOptions } from './src/parallel.ts';
export { sendUnlessClosed, WorkerHandle } from './src/handle.ts';
export { bindPort, type PortLike, PortSender, remoteWorker } from './src/remote.ts';

export { type MessageSender, UpdateChannel } from './src/channel.ts';
export {
	lineOptionsSchema,
	isCount,
	parseWorkerMessage,
	type UpdateMessage,
	updateMessageSchema,
	type WorkerMessage,
	workerMessageSchema,
} from './src/messages.ts';
export { type ProgressTracker, Tracker } from './src/tracker.ts';
export { ansiCSI, type DrawOptions, ProgressDisplay } from './src/display.ts';
export { type LineState, type RenderContext, renderBar, renderLine } from './src/render.ts';
export { OffsetPool } from './src/lib/offsetPool.ts';
export { type ConsoleSize, consoleSize } from './src/lib/consoleSize.ts';

export {
	type CoordinatorOptions,
	DEFAULT_LINE_OPTIONS,
	DEFAULT_RENDER_OPTIONS,
	type LineOptions,
	mergeLineOptions,
	type ProgressOptions,
	type ProgressWriter,
	type RenderOptions,
} from './src/options.ts';
export { ChannelClosedError, ConfigurationError, ProtocolViolationError } from './src/errors.ts';
export { LOG_LEVEL_ENV, type Logger, logger } from './src/logger.ts';
