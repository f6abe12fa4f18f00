import { ValidationError } from '@contact-desk/domain-kernel';
import { z } from 'zod';

export const LOG_LEVELS = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** An empty variable counts as unset. */
const unsetIfEmpty = (value: unknown) => (value === '' ? undefined : value);

export const AssistantEnvSchema = z.object({
  LOG_LEVEL: z.preprocess(unsetIfEmpty, z.enum(LOG_LEVELS).default('warn')),
  BIRTHDAY_WINDOW_DAYS: z.preprocess(
    unsetIfEmpty,
    z.coerce.number().int().min(0).max(365).default(7),
  ),
});

export interface AssistantConfig {
  logLevel: LogLevel;
  birthdayWindowDays: number;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AssistantConfig {
  const result = AssistantEnvSchema.safeParse(env);
  if (!result.success) {
    throw new ValidationError('Invalid assistant configuration', {
      issues: result.error.flatten().fieldErrors,
    });
  }
  return {
    logLevel: result.data.LOG_LEVEL,
    birthdayWindowDays: result.data.BIRTHDAY_WINDOW_DAYS,
  };
}
