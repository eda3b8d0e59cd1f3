import { z } from 'zod';
import { ConfigError } from './errors.js';

const booleanFlag = z.union([
  z.boolean(),
  z.enum(['true', 'false', '1', '0']).transform((value) => value === 'true' || value === '1'),
]);

const milliseconds = z.coerce.number().int().positive();

export const HarnessConfigSchema = z.object({
  host: z.string().min(1).default('127.0.0.1'),
  port: z.coerce.number().int().min(0).max(65535).default(8888), // 0 picks a free port
  scheme: z.enum(['http', 'https']).default('http'),
  verifyPath: z.string().startsWith('/', 'Path must start with "/"').default('/midi/ports'),
  expectedStatus: z.coerce.number().int().min(100).max(599).default(200),
  readinessTimeoutMs: milliseconds.default(60000),
  interruptTimeoutMs: milliseconds.default(10000),
  killTimeoutMs: milliseconds.default(5000),
  verifyTimeoutMs: milliseconds.default(10000),
  killTree: booleanFlag.default(true),
  lockDir: z.string().min(1).optional(),
});

export type HarnessConfig = z.infer<typeof HarnessConfigSchema>;
export type HarnessConfigInput = z.input<typeof HarnessConfigSchema>;

const ENV_KEYS: Record<string, keyof HarnessConfig> = {
  HARNESS_HOST: 'host',
  HARNESS_PORT: 'port',
  HARNESS_SCHEME: 'scheme',
  HARNESS_VERIFY_PATH: 'verifyPath',
  HARNESS_EXPECTED_STATUS: 'expectedStatus',
  HARNESS_READINESS_TIMEOUT_MS: 'readinessTimeoutMs',
  HARNESS_INTERRUPT_TIMEOUT_MS: 'interruptTimeoutMs',
  HARNESS_KILL_TIMEOUT_MS: 'killTimeoutMs',
  HARNESS_VERIFY_TIMEOUT_MS: 'verifyTimeoutMs',
  HARNESS_KILL_TREE: 'killTree',
  HARNESS_LOCK_DIR: 'lockDir',
};

export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [name, key] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value !== undefined && value !== '') {
      values[key] = value;
    }
  }
  return values;
}

/** Defaults, then `env`, then `overrides`. */
export function loadConfig(
  overrides: Record<string, unknown> = {},
  env: NodeJS.ProcessEnv = process.env
): HarnessConfig {
  const result = HarnessConfigSchema.safeParse({ ...configFromEnv(env), ...overrides });
  if (!result.success) {
    throw new ConfigError(
      'Invalid harness configuration',
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return result.data;
}
