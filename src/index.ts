export * from './hwpx/index.js';
export { CONFIG_FILE_NAME, loadWriterConfig, parseWriterConfig, writerOptions, WriterConfigSchema } from './config.js';
export type { WriterConfig } from './config.js';
export { logger, logToStderr } from './utils/logger.js';
export type { LogLevel } from './utils/logger.js';
