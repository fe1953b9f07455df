import { randomUUID } from 'node:crypto';
import type { DefaultEnvContext } from '../environment/types.js';
import type {
  CorrelationIdGenerator,
  DiagnosticConfig,
  DiagnosticContext,
  LogEntry,
  LogFields,
  Logger,
  LogOutputFormat,
  LogSeverity,
} from './types.js';

const severityLevels: Record<LogSeverity, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

const resetColor = '\x1b[0m';
const accentColor = '\x1b[34m';

const severityColors: Record<LogSeverity, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
};

const scopeDelimiter = '.';

export function isLogSeverity(value: unknown): value is LogSeverity {
  return typeof value === 'string' && value in severityLevels;
}

export function createCorrelationIdGenerator(): CorrelationIdGenerator {
  return {
    generateRootId(): string {
      return `req-${randomUUID()}`;
    },

    createScopedId(parentId: string, scope: string): string {
      return `${parentId}${scopeDelimiter}${scope}`;
    },

    extractRootId(scopedId: string): string {
      const firstDelimiterIndex = scopedId.indexOf(scopeDelimiter);
      return firstDelimiterIndex === -1 ? scopedId : scopedId.substring(0, firstDelimiterIndex);
    },
  };
}

function formatAsHumanReadable(entry: LogEntry): string {
  const color = severityColors[entry.severity];

  const parts: string[] = [
    `${color}${entry.severity.toUpperCase()}${resetColor}`,
    `${accentColor}${entry.serviceName}${resetColor}`,
  ];

  if (entry.correlationId) {
    parts.push(`[${entry.correlationId}]`);
  }

  parts.push(`${color}${entry.message}${resetColor}`);

  if (entry.fields) {
    parts.push(JSON.stringify(entry.fields));
  }

  return parts.join(' ');
}

function formatAsStructuredText(entry: LogEntry): string {
  const parts: string[] = [
    `timestamp=${entry.timestamp}`,
    `service_name=${entry.serviceName}`,
    `severity=${entry.severity}`,
    `message="${entry.message}"`,
  ];

  if (entry.correlationId) {
    parts.push(`correlation_id=${entry.correlationId}`);
  }

  for (const [key, value] of Object.entries(entry.fields ?? {})) {
    parts.push(`${key}=${typeof value === 'string' ? `"${value}"` : JSON.stringify(value)}`);
  }

  return parts.join(' ');
}

function formatLogEntry(entry: LogEntry, outputFormat: LogOutputFormat): string {
  switch (outputFormat) {
    case 'human':
      return formatAsHumanReadable(entry);
    case 'structured-text':
      return formatAsStructuredText(entry);
    case 'json':
    default:
      return JSON.stringify(entry);
  }
}

function isLogFields(value: unknown): value is LogFields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeError(error: unknown): LogFields {
  if (!(error instanceof Error)) {
    return { error: String(error) };
  }

  const plainObject: unknown =
    'toErrorPlainObject' in error && typeof error.toErrorPlainObject === 'function'
      ? error.toErrorPlainObject()
      : undefined;

  return {
    ...(error.name !== 'Error' ? { name: error.name } : {}),
    stack: error.stack,
    ...(isLogFields(plainObject) ? plainObject : {}),
  };
}

export function createLogger(
  serviceName: string,
  correlationId: string | undefined,
  config: DiagnosticConfig = {},
): Logger {
  const minimumSeverity = config.minimumSeverity ?? 'info';
  const outputFormat = config.outputFormat ?? 'human';

  function log(severity: LogSeverity, message: string, fields?: LogFields): void {
    if (severityLevels[severity] < severityLevels[minimumSeverity]) {
      return;
    }

    const mergedFields = { ...config.defaultLoggerArgs, ...fields };
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      severity,
      message,
      serviceName,
      correlationId,
      fields: Object.keys(mergedFields).length > 0 ? mergedFields : undefined,
    };

    const line = formatLogEntry(entry, outputFormat);

    if (severityLevels[severity] >= severityLevels.error) {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  function logError(
    severity: 'error' | 'fatal',
    error: unknown,
    message?: string | LogFields,
    fields?: LogFields,
  ): void {
    const extraFields = typeof message === 'string' ? fields : message;
    const extraMessage = typeof message === 'string' ? message : undefined;
    const errorMessage = error instanceof Error ? error.message : undefined;

    log(severity, errorMessage ?? extraMessage ?? String(error), {
      ...describeError(error),
      ...extraFields,
      ...(errorMessage && extraMessage ? { additionalMessage: extraMessage } : {}),
    });
  }

  return {
    debug: (message, fields) => log('debug', message, fields),
    info: (message, fields) => log('info', message, fields),
    warn: (message, fields) => log('warn', message, fields),
    error: (error, message, fields) => logError('error', error, message, fields),
    fatal: (error, message, fields) => logError('fatal', error, message, fields),

    createChild(scopeId: string): Logger {
      const childCorrelationId = correlationId
        ? `${correlationId}${scopeDelimiter}${scopeId}`
        : scopeId;

      return createLogger(serviceName, childCorrelationId, config);
    },
  };
}

export function createDiagnosticContext(
  envContext: DefaultEnvContext,
  config: DiagnosticConfig = {},
): DiagnosticContext {
  const correlationIdGenerator = createCorrelationIdGenerator();
  const serviceName = envContext.config.PROCESS_NAME;
  const rootId = config.correlationId ?? correlationIdGenerator.generateRootId();

  return {
    correlationIdGenerator,
    logger: createLogger(serviceName, rootId, config),
    createChildLogger: (correlationId: string) => createLogger(serviceName, correlationId, config),
    getChildDiagnosticContext: (defaultLoggerArgs?: LogFields, scopeId?: string) =>
      createDiagnosticContext(envContext, {
        ...config,
        correlationId: scopeId ? `${scopeId}::${rootId}` : rootId,
        defaultLoggerArgs: { ...config.defaultLoggerArgs, ...defaultLoggerArgs },
      }),
  };
}
