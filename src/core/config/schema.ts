/**
 * Store configuration schema (`<store root>/config.yaml`).
 */
import { z } from 'zod';

/**
 * Objects with inner defaults: treat undefined and null as `{}` so the inner defaults apply.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const ChangelogSettingsSchema = z.object({
  /** Entries shown by `changelog` when no --limit is given */
  limit: z.number().int().min(1).default(10),
});

export const ConfigSchema = z.object({
  /** Verticals seeded into every new matrix */
  default_verticals: z.array(z.string()).default([]),
  changelog: withDefaults(ChangelogSettingsSchema),
  log_level: LogLevelSchema.default('info'),
});

export type Config = z.infer<typeof ConfigSchema>;

/** An empty config.yaml parses to null and means "all defaults". */
export const ConfigFileSchema = withDefaults(ConfigSchema);
