import { Ajv, type AnySchema, type ErrorObject, type ValidateFunction } from 'ajv';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { createLogger, NAMESPACES } from '../../logging.js';
import tryJsonRepair from '../../utils/jsonRepair.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const SCHEMA_DIR = path.join(__dirname, '..', '..', 'schemas');

const log = createLogger(NAMESPACES.agents.base);

// useDefaults fills the empty lists that schemas declare as defaults.
export const ajv = new Ajv({ allErrors: true, strict: false, useDefaults: true });

export type JsonValidationResult<T> =
  | { valid: true; value: T; repaired: boolean }
  | { valid: false; value: unknown; errors: string[]; repaired: boolean };

export function loadSchema(name: string): AnySchema {
  return JSON.parse(fs.readFileSync(path.join(SCHEMA_DIR, `${name}.schema.json`), 'utf-8'));
}

export function compileSchema<T>(name: string): ValidateFunction<T> {
  return ajv.compile<T>(loadSchema(name));
}

/** Content of the first fenced code block, or the trimmed text when there is none. */
export function stripCodeFences(text: string): string {
  const fenced = /```(?:json|JSON)?\s*([\s\S]*?)```/.exec(text);
  return (fenced ? fenced[1] : text).trim();
}

/**
 * Parse model output as JSON, retrying through jsonrepair. Returns null when
 * neither attempt yields a value.
 */
export function parseJsonLoose(raw: string): { value: unknown; repaired: boolean } | null {
  const text = stripCodeFences(raw);
  if (!text) return null;

  try {
    const value: unknown = JSON.parse(text);
    return { value, repaired: false };
  } catch (error) {
    log('JSON.parse failed, trying repair: %s', error instanceof Error ? error.message : String(error));
  }

  const repairedText = tryJsonRepair(text);
  if (repairedText === null) return null;
  try {
    const value: unknown = JSON.parse(repairedText);
    return { value, repaired: true };
  } catch (error) {
    log('repaired JSON still unparseable: %s', error instanceof Error ? error.message : String(error));
    return null;
  }
}

export function formatValidationErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map((err) => `${err.instancePath || '(root)'} ${err.message ?? ''}`.trim());
}

export function validateJson<T>(validate: ValidateFunction<T>, raw: string): JsonValidationResult<T> {
  const parsed = parseJsonLoose(raw);
  if (!parsed) return { valid: false, value: null, errors: ['parse_failed'], repaired: false };

  const { value, repaired } = parsed;
  if (validate(value)) return { valid: true, value, repaired };
  return { valid: false, value, errors: formatValidationErrors(validate.errors), repaired };
}
