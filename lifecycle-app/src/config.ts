import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { DEFAULT_COURSE_DURATION_DAYS } from './features/catalog/course-terms.js';

const dataFile = (name: string): string => fileURLToPath(new URL(`../data/${name}`, import.meta.url));

const envSchema = z.object({
  DATABASE_URL: z.string().url(),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  DEFAULT_COURSE_DURATION_DAYS: z.coerce.number().int().positive().default(DEFAULT_COURSE_DURATION_DAYS),
  SEMESTER_POLICY_PATH: z.string().min(1).default(dataFile('semester-policy.json')),
  GRADING_SCALE_PATH: z.string().min(1).default(dataFile('grading-scale.json')),
  CERTIFICATE_RELAY_INTERVAL_MS: z.coerce.number().int().positive().default(5000),
});

export interface AppConfig {
  databaseUrl: string;
  port: number;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  defaultCourseDurationDays: number;
  semesterPolicyPath: string;
  gradingScalePath: string;
  certificateRelayIntervalMs: number;
}

export class ConfigError extends Error {
  constructor(readonly fieldErrors: Record<string, string[]>) {
    super(
      `Invalid or missing environment variables: ${Object.entries(fieldErrors)
        .map(([field, messages]) => `${field} (${messages.join(', ')})`)
        .join('; ')}`,
    );
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const fieldErrors: Record<string, string[]> = {};
    for (const [field, messages] of Object.entries(parsed.error.flatten().fieldErrors)) {
      if (messages !== undefined) fieldErrors[field] = messages;
    }
    throw new ConfigError(fieldErrors);
  }
  const values = parsed.data;
  return {
    databaseUrl: values.DATABASE_URL,
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    defaultCourseDurationDays: values.DEFAULT_COURSE_DURATION_DAYS,
    semesterPolicyPath: values.SEMESTER_POLICY_PATH,
    gradingScalePath: values.GRADING_SCALE_PATH,
    certificateRelayIntervalMs: values.CERTIFICATE_RELAY_INTERVAL_MS,
  };
}
