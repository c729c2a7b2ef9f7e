import { z } from 'zod';
import { LOG_LEVELS } from '../utils/logger.util';

export const DEFAULT_RUN_LIMITS = {
  max_call_depth: 64,
} as const;

export const RunLimitsSchema = z
  .object({
    max_call_depth: z.number().int().min(1).default(DEFAULT_RUN_LIMITS.max_call_depth),
    max_steps: z.number().int().min(1).optional(),
  })
  .strict();

/** Resolved settings of one `crawl run`: defaults < config file < env < flags. */
export const RunConfigSchema = z
  .object({
    seed: z.number().int().nonnegative().optional(),
    entry: z.string().min(1).optional(),
    tables_dir: z.string().min(1).optional(),
    facts_file: z.string().min(1).optional(),
    log_level: z.enum(LOG_LEVELS).default('warn'),
    limits: RunLimitsSchema.default({}),
  })
  .strict();

export type RunConfigType = z.infer<typeof RunConfigSchema>;
export type RunConfigInput = z.input<typeof RunConfigSchema>;

export function parse_run_config(input: unknown) {
  return RunConfigSchema.safeParse(input);
}
