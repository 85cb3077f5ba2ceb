import { z } from 'zod';

export const PROTOCOLS = ['git', 'ssh', 'http', 'https', 'ssh-colon', 'file', 'relative'] as const;

export const ProtocolSchema = z.enum(PROTOCOLS, {
  errorMap: (issue, ctx) => {
    if (issue.code === 'invalid_enum_value') {
      return {
        message: `replace/protocol "${String(issue.received)}" is invalid (valid protocols: ${PROTOCOLS.join(', ')})`,
      };
    }
    return { message: ctx.defaultError };
  },
});
export type Protocol = z.infer<typeof ProtocolSchema>;

/**
 * Regex fragments spliced into the composite URI pattern.
 * They must not contain anchors like '^' and '$'.
 */
export const SearchConfigSchema = z.object({
  hostname: z.string().min(1, 'search.hostname must not be empty'),
  path: z.string(),
});
export type SearchConfig = z.infer<typeof SearchConfigSchema>;

export const ReplaceConfigSchema = z.object({
  hostname: z.string().min(1).optional(),
  username: z.string().min(1).optional(),
  protocol: ProtocolSchema.default('ssh'),
  substitutions: z.record(z.string(), z.string()),
});

export const ConfigSchema = z.object({
  search: SearchConfigSchema,
  replace: ReplaceConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;
