import { type Logger, pino } from '../deps.ts';

export type { Logger };

/** Environment variable selecting the log level; unset means `silent`. */
export const LOG_LEVEL_ENV = 'PARALLEL_PROGRESS_LOG_LEVEL';

// * logs go to STDERR (fd 2) and are off by default; interleaved log records would tear the progress block
export const logger: Logger = pino(
	{
		name: 'parallel-progress',
		level: process.env[LOG_LEVEL_ENV] ?? 'silent',
		timestamp: pino.stdTimeFunctions.isoTime,
	},
	pino.destination(2),
);
