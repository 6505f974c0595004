import yaml from 'js-yaml';
import { TakeoffError, type TakeoffErrorCode } from './takeoff-error';

export const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Reads a YAML or JSON document into a plain object. An empty document is an
 * empty object.
 */
export const parseStructuredPayload = (
  raw: string,
  code: TakeoffErrorCode,
  label: string,
): Record<string, unknown> => {
  let parsed: unknown;
  try {
    // First try YAML
    parsed = yaml.load(raw);
  } catch (yamlError) {
    try {
      parsed = JSON.parse(raw);
    } catch {
      throw new TakeoffError(code, `${label} must be valid YAML or JSON`, {
        yaml: yamlError instanceof Error ? yamlError.message : String(yamlError),
      });
    }
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw new TakeoffError(code, `${label} must be a key/value document`);
  }
  return parsed;
};

/**
 * Overlays `overrides` on `base`: nested objects merge per key, anything else
 * (lists included) replaces the base value.
 */
export const deepMerge = (
  base: Record<string, unknown>,
  overrides: Record<string, unknown>,
): Record<string, unknown> => {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) {
      continue;
    }
    const current = merged[key];
    merged[key] =
      isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }
  return merged;
};
