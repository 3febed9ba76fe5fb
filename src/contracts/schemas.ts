import { z } from 'zod'

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error'])

export const TimestampSourceSchema = z.enum(['birthtime', 'mtime'])

export const ChannelStoreKindSchema = z.enum(['auto', 'ads', 'shadow'])

// Config schema
export const BakscopeConfigSchema = z.object({
  backupDirectory: z.string().min(1).optional(),
  productionDirectory: z.string().min(1).optional(),
  timestampSource: TimestampSourceSchema.default('birthtime'),
  metadata: z.object({
    store: ChannelStoreKindSchema.default('auto'),
    shadowDirectory: z.string().min(1).optional(),
    maxAttempts: z.number().int().min(1).max(10).default(3),
    tempDirectory: z.string().min(1).optional(),
  }).default({
    store: 'auto',
    maxAttempts: 3,
  }),
  log: z.object({
    level: LogLevelSchema.default('info'),
    file: z.string().min(1).optional(),
  }).default({
    level: 'info',
  }),
  editor: z.object({
    command: z.string().min(1),
    args: z.array(z.string()).default([]),
    wait: z.boolean().default(false),
  }).optional(),
})
