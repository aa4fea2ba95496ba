import sprintfJs from 'sprintf-js';

export { default as chalk, foregroundColorNames } from 'chalk';
export type { ForegroundColorName } from 'chalk';

// `sprintf-js` is CommonJS; reach its functions through the module object
export const sprintf = sprintfJs.sprintf;

export { default as cliTruncate } from 'cli-truncate';
export { default as stringWidth } from 'string-width';

export { default as pino } from 'pino';
export type { Logger } from 'pino';

export { z } from 'zod';
