import { DEFAULT_DDL_NAMESPACE } from '../copybook/ddl.js';
import { invalidParams } from './errors.js';

export type ToolExposureMode = 'standard' | 'full';

export const TOOL_MODE_ENV = 'COPYBOOK_TOOL_MODE';
export const DDL_NAMESPACE_ENV = 'COPYBOOK_DDL_NAMESPACE';

const SQL_IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

function readEnv(envName: string): string | undefined {
  const raw = process.env[envName];
  if (!raw || raw.trim().length === 0) return undefined;
  return raw.trim();
}

export function validateNamespace(value: string, source: string): string {
  if (!SQL_IDENTIFIER_RE.test(value)) {
    throw invalidParams(`${source} must be a plain SQL identifier`, { source, value });
  }
  return value;
}

export function resolveToolMode(): ToolExposureMode {
  return readEnv(TOOL_MODE_ENV) === 'full' ? 'full' : 'standard';
}

/** Namespace for generated CREATE TABLE statements; `bronze` unless overridden. */
export function resolveDdlNamespace(): string {
  const fromEnv = readEnv(DDL_NAMESPACE_ENV);
  if (fromEnv === undefined) return DEFAULT_DDL_NAMESPACE;
  return validateNamespace(fromEnv, DDL_NAMESPACE_ENV);
}
