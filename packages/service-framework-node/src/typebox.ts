export * as TB from '@sinclair/typebox';
