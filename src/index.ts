export { compile, tokenize, parse_source } from './compiler';
export * from './engine';
export * from './adapters';
export { seeded_die_source, random_die_source, sequence_die_source } from './utils/rng.util';
export type { DieSource } from './utils/rng.util';
export { create_logger, configure_logger, logger } from './utils/logger.util';
export type { Logger, LogLevel, LoggerConfig } from './utils/logger.util';
export type * from './types';
export * from './engine/ast/nodes';
export { RunConfigSchema } from './schema';
export type { RunConfigType } from './schema';
