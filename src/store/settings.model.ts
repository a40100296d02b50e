import { z } from 'zod';

export const RefreshPolicySchema = z.enum(['none', 'refresh-this', 'refresh-parent', 'assume-deleted']);

export type RefreshPolicy = z.infer<typeof RefreshPolicySchema>;

export const CleanupSettingsSchema = z.object({
  title: z.string(),
  command: z.string(),
  active: z.boolean(),
  worksForDir: z.boolean(),
  worksForFile: z.boolean(),
  recurse: z.boolean(),
  askForConfirmation: z.boolean(),
  refreshPolicy: RefreshPolicySchema,
});

export type CleanupSettings = z.infer<typeof CleanupSettingsSchema>;

export const ActivitySchema = z.object({
  points: z.number().int().min(0).default(0),
});

export const SettingsFileSchema = z.object({
  version: z.literal(1).default(1),
  cleanups: z.record(z.string(), CleanupSettingsSchema).default({}),
  activity: ActivitySchema.default({}),
});

export type SettingsFile = z.infer<typeof SettingsFileSchema>;
