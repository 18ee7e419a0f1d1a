import { z } from 'zod';

const positiveInt = (name: string) =>
  z.number().int(`${name} must be an integer`).min(0, `${name} must not be negative`);

const clientConfigSchema = z.object({
  maxRetries: positiveInt('maxRetries').default(5),
  minConnectionTimeoutMs: positiveInt('minConnectionTimeoutMs').default(10_000),
  pollIntervalMs: positiveInt('pollIntervalMs').default(5_000),
  retryServiceUnavailable: z.boolean().default(true),
  userAgent: z.string().min(1, 'userAgent must not be empty').optional(),
  proxyUrl: z.string().url('proxyUrl must be a valid URL').optional(),
  sendPlatformInfo: z.boolean().default(true),
});

/** Settings shared by the request executor, transports and document poller. */
type ClientConfig = z.infer<typeof clientConfigSchema>;
type ClientConfigInput = z.input<typeof clientConfigSchema>;

const ENV_AUTH_KEY = 'TRANSLATOR_AUTH_KEY';
const ENV_SERVER_URL = 'TRANSLATOR_SERVER_URL';
const ENV_PROXY_URL = 'TRANSLATOR_PROXY_URL';

type EnvConfig = {
  authKey?: string;
  serverUrl?: string;
  proxyUrl?: string;
};

const nonEmpty = z.preprocess((value) => {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length ? trimmed : undefined;
  }

  return value;
}, z.string().optional());

const envConfigSchema = z.object({
  [ENV_AUTH_KEY]: nonEmpty,
  [ENV_SERVER_URL]: nonEmpty.pipe(z.string().url(`Invalid ${ENV_SERVER_URL}`).optional()),
  [ENV_PROXY_URL]: nonEmpty.pipe(z.string().url(`Invalid ${ENV_PROXY_URL}`).optional()),
});

export function resolveClientConfig(input?: ClientConfigInput): ClientConfig {
  const parsed = clientConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new Error(parsed.error.issues[0]?.message ?? 'Invalid client configuration');
  }

  return parsed.data;
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = envConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(parsed.error.issues[0]?.message ?? 'Invalid environment configuration');
  }

  return {
    authKey: parsed.data[ENV_AUTH_KEY],
    serverUrl: parsed.data[ENV_SERVER_URL],
    proxyUrl: parsed.data[ENV_PROXY_URL],
  };
}

export { clientConfigSchema, ENV_AUTH_KEY, ENV_PROXY_URL, ENV_SERVER_URL };
export type { ClientConfig, ClientConfigInput, EnvConfig };
