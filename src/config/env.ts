import { z } from 'zod';

export class MissingEnvError extends Error {
  constructor(readonly missing: string[]) {
    super(`Missing env: ${missing.join('/')}`);
    this.name = 'MissingEnvError';
  }
}

const COMMON_REQUIRED = ['PROJECT_ID', 'REGION', 'SERVICE_ACCOUNT', 'DEPLOYMENT_NAME'] as const;

const column = z.string().regex(/^[A-Z]+$/, 'must be a column letter');

const SplitterEnvSchema = z.object({
  PROJECT_ID: z.string(),
  REGION: z.string(),
  SERVICE_ACCOUNT: z.string(),
  DEPLOYMENT_NAME: z.string(),
  PUBSUB_TOPIC: z.string(),
  PORT: z.coerce.number().int().positive().default(8080),
  STATUS_COLUMN: column.default('P'),
  UPDATED_AT_COLUMN: column.default('Q'),
  MESSAGE_COLUMN: column.default('R'),
});

const WorkerEnvSchema = z.object({
  PROJECT_ID: z.string(),
  REGION: z.string(),
  SERVICE_ACCOUNT: z.string(),
  DEPLOYMENT_NAME: z.string(),
  OUTPUT_DIRECTORY: z.string(),
  PORT: z.coerce.number().int().positive().default(8080),
  DUBBING_ENGINE_COMMAND: z.string().default('dubbing-engine'),
});

export type SplitterEnv = z.infer<typeof SplitterEnvSchema>;
export type WorkerEnv = z.infer<typeof WorkerEnvSchema>;

type Env = Record<string, string | undefined>;

// 空文字も「未設定」として扱う
function assertPresent(env: Env, names: readonly string[]): void {
  const missing = names.filter((name) => !env[name]);
  if (missing.length > 0) throw new MissingEnvError(missing);
}

function withoutEmpty(env: Env): Env {
  return Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));
}

export function loadSplitterEnv(env: Env = process.env): SplitterEnv {
  assertPresent(env, [...COMMON_REQUIRED, 'PUBSUB_TOPIC']);
  return SplitterEnvSchema.parse(withoutEmpty(env));
}

export function loadWorkerEnv(env: Env = process.env): WorkerEnv {
  assertPresent(env, [...COMMON_REQUIRED, 'OUTPUT_DIRECTORY']);
  return WorkerEnvSchema.parse(withoutEmpty(env));
}
