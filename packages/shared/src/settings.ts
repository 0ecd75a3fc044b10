import { z } from 'zod';

export const CURRENT_SETTINGS_VERSION = 1 as const;

export const LogLevel = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']);
export type LogLevel = z.infer<typeof LogLevel>;

export const PathsSchema = z.object({
  watchDir: z.string().trim().min(1, 'paths.watchDir is required'),
  archiveRoot: z.string().trim().min(1, 'paths.archiveRoot is required'),
  publishDir: z.string().trim().min(1, 'paths.publishDir is required'),
  logDir: z.string().trim().min(1).default('logs')
});

export const PublishSchema = z.object({
  keepCount: z.number().int().min(1).default(2)
});

export const ArchiveSchema = z.object({
  commitOnArchive: z.boolean().default(true),
  authorName: z.string().min(1).default('Chip Warden'),
  authorEmail: z.string().min(1).default('chip-warden@localhost')
});

export const NotificationsSchema = z.object({
  enabled: z.boolean().default(false),
  chatId: z.union([z.string(), z.number()]).transform((value) => String(value).trim()).default(''),
  notifyOnPost: z.boolean().default(true),
  queueLimit: z.number().int().min(1).max(10_000).default(50),
  commands: z.boolean().default(true)
});

export const WatcherSchema = z.object({
  settleDelayMs: z.number().int().min(0).max(60_000).default(500),
  extensions: z
    .array(z.string().min(1))
    .min(1)
    .transform((list) => list.map((ext) => (ext.startsWith('.') ? ext : `.${ext}`).toLowerCase()))
    .default(['.nc', '.gcode']),
  processExisting: z.boolean().default(false)
});

export const LoggingSchema = z.object({
  level: LogLevel.default('info'),
  retentionDays: z.number().int().min(1).default(14)
});

export const SettingsSchema = z.object({
  version: z.number().int().min(1).default(CURRENT_SETTINGS_VERSION),
  paths: PathsSchema,
  publish: PublishSchema.default({}),
  archive: ArchiveSchema.default({}),
  notifications: NotificationsSchema.default({}),
  watcher: WatcherSchema.default({}),
  logging: LoggingSchema.default({})
});
export type Settings = z.infer<typeof SettingsSchema>;
