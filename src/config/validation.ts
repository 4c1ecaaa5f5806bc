import { z } from 'zod';

export const configSchema = z.object({
  server: z.object({
    port: z.number().int().min(0).max(65535),
    host: z.string(),
  }),
  updates: z.object({
    directory: z.string(),
    channel: z.enum(['default', 'stable']),
    // Path segment in the download URL; defaults to the directory's basename
    path: z.string().min(1).optional(),
    downloadBaseUrl: z.string().url(),
  }),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']),
    filePath: z.string().optional(),
    rotate: z.enum(['none', 'daily', 'size']).default('none'),
    maxSizeMB: z.number().min(1).max(1024).default(10),
    maxFiles: z.number().min(1).max(100).default(5),
  }),
  nodeEnv: z.string(),
});

export type Config = z.infer<typeof configSchema>;
