import { log } from '@workspace/logger';
import { z } from 'zod';
import { ENV_AUTH_KEY, loadEnvConfig } from '../config.js';
import { ApiError, DocumentTranslationError } from '../errors.js';
import { Translator } from '../translator.js';
import { formatJson } from '../utils/json.js';

const booleanFromCliSchema = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

function cliBoolean() {
  return z
    .preprocess((value) => {
      if (value === undefined) {
        return 'false';
      }

      if (typeof value === 'string') {
        return value.toLowerCase();
      }

      return value;
    }, booleanFromCliSchema)
    .default(false);
}

function trimToUndefined(value: unknown): unknown {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length ? trimmed : undefined;
  }

  return value;
}

function optionalCliString(message: string) {
  return z.preprocess(trimToUndefined, z.string().min(1, message).optional());
}

function requiredCliString(message: string) {
  return z.preprocess(trimToUndefined, z.string({ required_error: message }).min(1, message));
}

function optionalCliInt(message: string) {
  return z.preprocess(
    (value) => {
      const trimmed = trimToUndefined(value);
      return typeof trimmed === 'string' ? Number(trimmed) : trimmed;
    },
    z.number({ invalid_type_error: message }).int(message).positive(message).optional(),
  );
}

const connectionArgsSchema = z.object({
  authKey: optionalCliString('Invalid --authKey'),
  serverUrl: optionalCliString('Invalid --serverUrl').pipe(z.string().url('Invalid --serverUrl').optional()),
  proxyUrl: optionalCliString('Invalid --proxyUrl').pipe(z.string().url('Invalid --proxyUrl').optional()),
  transport: z
    .preprocess(trimToUndefined, z.enum(['axios', 'fetch'], { errorMap: () => ({ message: 'Invalid --transport. Use axios or fetch.' }) }))
    .default('axios'),
  pretty: cliBoolean(),
  outputFile: optionalCliString('Invalid --outputFile path'),
});

type ConnectionArgs = z.infer<typeof connectionArgsSchema>;

function describeFailure(error: ApiError): Record<string, unknown> {
  return {
    success: false,
    error: error.message,
    errorName: error.name,
    httpStatusCode: error.httpStatusCode,
    ...(error instanceof DocumentTranslationError ? { document: error.handle.toJSON() } : {}),
  };
}

/**
 * Builds a Translator from CLI options and the environment, runs `action`
 * with it and reports API errors as JSON on stderr.
 */
export async function withTranslator(
  args: ConnectionArgs,
  action: (translator: Translator) => Promise<number>,
): Promise<number> {
  const env = loadEnvConfig();
  const authKey = args.authKey ?? env.authKey;
  if (!authKey) {
    console.error(`Missing auth key: pass --authKey or set ${ENV_AUTH_KEY}`);
    return 1;
  }

  const translator = new Translator(authKey, {
    serverUrl: args.serverUrl ?? env.serverUrl,
    proxyUrl: args.proxyUrl ?? env.proxyUrl,
    transport: args.transport,
  });
  const startTime = Date.now();

  try {
    return await action(translator);
  } catch (error) {
    if (!(error instanceof ApiError)) {
      throw error;
    }

    log.error('Translation API call failed', error);
    console.error(formatJson(describeFailure(error), args.pretty));
    return 1;
  } finally {
    log.info(`Execution finished in ${Date.now() - startTime}ms`, translator.metrics.snapshot());
    await translator.close();
  }
}

export {
  cliBoolean,
  connectionArgsSchema,
  optionalCliInt,
  optionalCliString,
  requiredCliString,
};
export type { ConnectionArgs };
