import { randomUUID } from 'node:crypto';
import { isPlainObject, MdmError } from '@mdm-mcp/core';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';

export type LogFields = Record<string, unknown>;

type LogRecord = LogFields & {
  ts: string;
  level: LogLevel;
  msg: string;
};

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const REDACTED = '[REDACTED]';

/** Field names whose values never reach the log, whatever their type */
const SECRET_KEY_PATTERN =
  /^(password|token|accessToken|access_token|clientSecret|client_secret|secret|authorization|bearerToken)$/i;

/** Credentials that show up inside free text: headers, URLs, token responses */
const SECRET_TEXT_PATTERNS: Array<[RegExp, string]> = [
  [/\bBearer\s+[A-Za-z0-9._~+/=-]{8,}/g, `Bearer ${REDACTED}`],
  [/\bBasic\s+[A-Za-z0-9+/=]{8,}/g, `Basic ${REDACTED}`],
  [/([a-z][a-z0-9+.-]*:\/\/[^:\s/]+:)[^@\s/]+@/gi, `$1${REDACTED}@`],
  [/(access_token=)[^&\s"]+/gi, `$1${REDACTED}`],
];

function redactText(value: string): string {
  return SECRET_TEXT_PATTERNS.reduce((text, [pattern, replacement]) => text.replace(pattern, replacement), value);
}

function redactFields(fields: LogFields): LogFields {
  const out: LogFields = {};
  for (const [key, value] of Object.entries(fields)) {
    out[key] = SECRET_KEY_PATTERN.test(key) ? REDACTED : redactSecrets(value);
  }
  return out;
}

/** Remote response bodies are not logged */
function describeError(error: Error): LogFields {
  const described: LogFields = { name: error.name, message: redactText(error.message) };
  if (error instanceof MdmError) {
    described['code'] = error.code;
    if (error.status !== undefined) described['status'] = error.status;
    if (error.suggestion) described['suggestion'] = error.suggestion;
    if (error.context) described['context'] = redactFields(error.context);
  } else if ('code' in error && typeof error.code === 'string') {
    described['code'] = error.code;
  }
  if (error.stack) described['stack'] = redactText(error.stack);
  return described;
}

export function redactSecrets(value: unknown): unknown {
  if (value === null || value === undefined) return value;
  if (typeof value === 'string') return redactText(value);
  if (typeof value === 'number' || typeof value === 'boolean') return value;
  if (Array.isArray(value)) return value.map(redactSecrets);
  if (value instanceof Error) return describeError(value);
  if (isPlainObject(value)) return redactFields(value);
  return String(value);
}

function renderText(record: LogRecord): string {
  const trace = typeof record['traceId'] === 'string' ? ` trace=${record['traceId']}` : '';
  const tool = typeof record['tool'] === 'string' ? ` tool=${record['tool']}` : '';
  return `[${record.ts}] ${record.level.toUpperCase()}${trace}${tool} ${record.msg}\n`;
}

/**
 * Structured logger writing to stderr only; stdout carries the MCP stdio stream.
 */
export class Logger {
  constructor(
    private readonly options: {
      level?: LogLevel;
      format?: LogFormat;
    } = {}
  ) {}

  /** Logger that adds `fields` to every record and forwards to this one */
  child(fields: LogFields): Logger {
    const parent = this;
    return new (class extends Logger {
      override log(level: LogLevel, msg: string, extra?: LogFields): void {
        parent.log(level, msg, { ...fields, ...extra });
      }
    })(this.options);
  }

  log(level: LogLevel, msg: string, extra?: LogFields): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.options.level ?? 'info']) return;

    const record: LogRecord = {
      ...redactFields(extra ?? {}),
      ts: new Date().toISOString(),
      level,
      msg: redactText(msg),
    };

    process.stderr.write(
      this.options.format === 'json' ? `${JSON.stringify(record)}\n` : renderText(record)
    );
  }

  debug(msg: string, extra?: LogFields): void {
    this.log('debug', msg, extra);
  }

  info(msg: string, extra?: LogFields): void {
    this.log('info', msg, extra);
  }

  warn(msg: string, extra?: LogFields): void {
    this.log('warn', msg, extra);
  }

  error(msg: string, extra?: LogFields): void {
    this.log('error', msg, extra);
  }
}

export function createTraceId(): string {
  return randomUUID();
}
