import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { isPlainObject, TENANT_ID_PATTERN } from '@mdm-mcp/core';
import { z } from 'zod';

export type TransportMode = 'stdio' | 'http';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type EnvExpansionOptions = {
  env?: NodeJS.ProcessEnv;
};

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  const env = options?.env ?? process.env;
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, fallback] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const value = env[name];
    if (value !== undefined && value !== '') return value;
    if (fallback !== undefined) return fallback;

    throw new ConfigError(`Missing required environment variable: ${name}`);
  });
}

/** Replace `${NAME}` and `${NAME:-default}` in every string of a parsed JSON document */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

export const serverSchema = z
  .object({
    name: z.string().min(1).optional(),
    version: z.string().min(1).optional(),
    transport: z.enum(['stdio', 'http']).optional(),
    http: z
      .object({
        host: z.string().min(1).optional(),
        port: z.number().int().min(1).max(65535).optional(),
        path: z.string().min(1).optional(),
        healthPath: z.string().min(1).optional(),
        bearerTokenEnv: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        format: z.enum(['text', 'json']).optional(),
        level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
      })
      .strict()
      .optional(),
    toolTimeoutMs: z.number().int().min(1).max(600_000).optional(),
  })
  .strict()
  .optional();

export type ServerSettings = NonNullable<z.infer<typeof serverSchema>>;

export const mdmSchema = z
  .object({
    environment: z.string().min(1),
    host: z.string().min(1).optional(),
    tenant: z.string().regex(TENANT_ID_PATTERN, 'Invalid tenant ID format'),
    clientId: z.string().min(1),
    clientSecret: z.string().min(1),
    authServer: z.string().url(),
    tokenCache: z.boolean().optional(),
    requestTimeoutMs: z.number().int().min(1).max(600_000).optional(),
    longRequestTimeoutMs: z.number().int().min(1).max(600_000).optional(),
    sourceTag: z.string().min(1).optional(),
    activityLabel: z.string().min(1).optional(),
  })
  .strict();

export type MdmSettings = z.infer<typeof mdmSchema>;

export const configFileSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    server: serverSchema,
    mdm: mdmSchema,
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export function formatZodError(err: z.ZodError, label = 'Invalid config.json'): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${label}:\n${issues}`;
}

function envNumber(raw: string | undefined): number | undefined {
  return raw === undefined || raw === '' ? undefined : Number(raw);
}

function envFlag(raw: string | undefined): boolean | undefined {
  if (raw === undefined || raw === '') return undefined;
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

function envString(raw: string | undefined): string | undefined {
  return raw === undefined || raw === '' ? undefined : raw;
}

function compact(value: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    if (v !== undefined) out[k] = v;
  }
  return out;
}

/**
 * Raw configuration document assembled from environment variables.
 * Validation happens in {@link parseConfig}.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const http = compact({
    host: envString(env['MCP_HTTP_HOST']),
    port: envNumber(env['MCP_HTTP_PORT']),
    path: envString(env['MCP_HTTP_PATH']),
    bearerTokenEnv: envString(env['MCP_HTTP_BEARER_TOKEN_ENV']),
  });
  const logging = compact({
    level: envString(env['LOG_LEVEL'])?.toLowerCase(),
    format: envString(env['LOG_FORMAT'])?.toLowerCase(),
  });

  return {
    server: compact({
      name: envString(env['RELTIO_SERVER_NAME']) ?? 'mdm-mcp-server',
      transport: envString(env['MCP_TRANSPORT'])?.toLowerCase(),
      http: Object.keys(http).length > 0 ? http : undefined,
      logging: Object.keys(logging).length > 0 ? logging : undefined,
      toolTimeoutMs: envNumber(env['MCP_TOOL_TIMEOUT_MS']),
    }),
    mdm: compact({
      environment: envString(env['RELTIO_ENVIRONMENT']) ?? 'dev',
      host: envString(env['RELTIO_HOST']),
      tenant: env['RELTIO_TENANT'] ?? '',
      clientId: env['RELTIO_CLIENT_ID'] ?? '',
      clientSecret: env['RELTIO_CLIENT_SECRET'] ?? '',
      authServer: envString(env['RELTIO_AUTH_SERVER']) ?? 'https://auth.reltio.com',
      tokenCache: envFlag(env['RELTIO_TOKEN_CACHE']),
      requestTimeoutMs: envNumber(env['RELTIO_REQUEST_TIMEOUT_MS']),
      longRequestTimeoutMs: envNumber(env['RELTIO_LONG_REQUEST_TIMEOUT_MS']),
    }),
  };
}

export function parseConfig(raw: unknown, label?: string): ConfigFile {
  const result = configFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(formatZodError(result.error, label));
  }
  return result.data;
}

export type LoadConfigOptions = {
  /** JSON config file; environment variables are used when absent */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
};

export async function loadConfig(options: LoadConfigOptions = {}): Promise<ConfigFile> {
  const env = options.env ?? process.env;

  if (!options.configPath) {
    return parseConfig(configFromEnv(env), 'Invalid environment configuration');
  }

  const absolutePath = resolve(options.cwd ?? process.cwd(), options.configPath);
  const content = await readFile(absolutePath, 'utf-8');
  // Strip a UTF-8 BOM.
  const sanitized = content.replace(/^\uFEFF/, '');

  let parsed: unknown;
  try {
    parsed = JSON.parse(sanitized);
  } catch (err) {
    throw new ConfigError(
      `Invalid config.json: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  return parseConfig(expandEnvVars(parsed, { env }));
}
