import { type Static, type TSchema, Type } from '@sinclair/typebox';

export type EnvSource = Record<string, string | undefined>;

export interface EnvValidationError {
  readonly path: string;
  readonly message: string;
  readonly value?: unknown;
}

export interface ParsedEnv<T> {
  readonly config: T;
  readonly errors?: EnvValidationError[];
}

export interface EnvParserConfig {
  readonly redactSensitive?: boolean;
  readonly source?: EnvSource;
}

export interface EnvParser {
  parse<T extends TSchema>(schema: T, config?: EnvParserConfig): Static<T>;
  validate<T extends TSchema>(
    schema: T,
    source: Record<string, unknown>,
    config?: EnvParserConfig,
  ): ParsedEnv<Static<T>>;
}

export interface EnvContext<T = DefaultEnv> {
  readonly config: T;
  readonly nodeEnv: string;
}

export interface DefaultEnv {
  PROCESS_NAME: string;
}

export const DefaultEnvSchemaType = Type.Object({
  PROCESS_NAME: Type.String({ minLength: 1 }),
});
export type DefaultEnvSchema = Static<typeof DefaultEnvSchemaType>;

export type DefaultEnvContext = EnvContext<DefaultEnv>;
