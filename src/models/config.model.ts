import { z } from 'zod';
import { join } from 'node:path';
import { homedir } from 'node:os';

export const ConfigSchema = z.object({
  settings: z.object({
    path: z.string().default(join(homedir(), '.config', 'dirtidy')),
  }).default({}),
  cleanups: z.object({
    userCleanups: z.number().int().min(0).default(10),
    shell: z.string().min(1).default('/bin/sh'),
  }).default({}),
  activity: z.object({
    feedbackThreshold: z.number().int().positive().default(100),
  }).default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
