import type { Static, TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import type {
  DefaultEnvSchema,
  EnvContext,
  EnvParser,
  EnvParserConfig,
  EnvSource,
  EnvValidationError,
  ParsedEnv,
} from './types.js';

const SENSITIVE_PATTERNS = [/password/i, /secret/i, /key/i, /token/i, /credential/i, /auth/i];

const TRUE_VALUES = ['true', '1', 'yes', 'on'];
const FALSE_VALUES = ['false', '0', 'no', 'off'];

function redactValue(key: string, value: unknown): unknown {
  return SENSITIVE_PATTERNS.some((pattern) => pattern.test(key)) ? '[REDACTED]' : value;
}

function schemaTypeOf(schema: TSchema): string | undefined {
  return 'type' in schema && typeof schema.type === 'string' ? schema.type : undefined;
}

function coerceValue(value: string, targetType: string | undefined): unknown {
  switch (targetType) {
    case 'number':
    case 'integer': {
      const parsed = Number(value);
      return Number.isNaN(parsed) ? value : parsed;
    }
    case 'boolean': {
      const lower = value.toLowerCase();
      if (TRUE_VALUES.includes(lower)) return true;
      if (FALSE_VALUES.includes(lower)) return false;
      return value;
    }
    case 'object':
    case 'array': {
      try {
        return JSON.parse(value);
      } catch {
        return value;
      }
    }
    default:
      return value;
  }
}

// Unparseable values are passed through untouched so that validation reports them.
function coerceEnvValues(source: EnvSource, schema: TSchema): Record<string, unknown> {
  if (!('properties' in schema) || typeof schema.properties !== 'object' || !schema.properties) {
    return { ...source };
  }

  const coerced: Record<string, unknown> = {};

  for (const [key, propertySchema] of Object.entries<TSchema>(schema.properties)) {
    const value = source[key];
    coerced[key] =
      value === undefined || value === '' ? undefined : coerceValue(value, schemaTypeOf(propertySchema));
  }

  return coerced;
}

function formatValidationErrors(errors: EnvValidationError[]): string {
  const lines = ['Configuration validation failed:'];

  for (const error of errors) {
    const valuePart = error.value !== undefined ? `, received ${JSON.stringify(error.value)}` : '';
    lines.push(`  - ${error.path}: ${error.message}${valuePart}`);
  }

  return lines.join('\n');
}

export function createEnvParser(): EnvParser {
  const validate = <T extends TSchema>(
    schema: T,
    source: Record<string, unknown>,
    config: EnvParserConfig = {},
  ): ParsedEnv<Static<T>> => {
    const redactSensitive = config.redactSensitive ?? true;

    if (Value.Check(schema, source)) {
      return { config: source };
    }

    const errors: EnvValidationError[] = [...Value.Errors(schema, source)].map((error) => {
      const path = error.path.replace(/^\//, '').replace(/\//g, '.') || 'root';
      return {
        path,
        message: error.message,
        value: redactSensitive ? redactValue(path, error.value) : error.value,
      };
    });

    return { config: Value.Cast(schema, source), errors };
  };

  const parse = <T extends TSchema>(schema: T, config: EnvParserConfig = {}): Static<T> => {
    const coerced = coerceEnvValues(config.source ?? process.env, schema);
    const withDefaults: unknown = Value.Default(schema, coerced);
    const result = validate(
      schema,
      typeof withDefaults === 'object' && withDefaults !== null ? { ...withDefaults } : coerced,
      config,
    );

    if (result.errors && result.errors.length > 0) {
      throw new Error(formatValidationErrors(result.errors));
    }

    return result.config;
  };

  return { parse, validate };
}

export function createEnvContext<T extends TSchema & { static: DefaultEnvSchema }>(
  schema: T,
  config?: EnvParserConfig,
): EnvContext<Static<T>> {
  const parsedConfig = createEnvParser().parse(schema, config);

  const nodeEnv =
    parsedConfig &&
    typeof parsedConfig === 'object' &&
    'NODE_ENV' in parsedConfig &&
    typeof parsedConfig.NODE_ENV === 'string'
      ? parsedConfig.NODE_ENV
      : 'development';

  return {
    config: parsedConfig,
    nodeEnv,
  };
}
