import { readFile } from 'fs/promises';
import type { ZodIssue } from 'zod';
import { config } from './env';
import { defaultProjectConfig } from './default-project-config';
import { type ProjectConfig, projectConfigSchema } from './project-config.schema';
import { deepMerge, parseStructuredPayload } from '../utils/structured-payload';
import { createScopedLogger } from '../utils/logger';
import { TakeoffError, describeError } from '../utils/takeoff-error';

const log = createScopedLogger('ProjectConfig');

const formatIssues = (issues: ZodIssue[]) =>
  issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));

/**
 * Validates user values layered over `base`. Record sections (ratios,
 * sheetMap, fitting tables) merge per key; lists such as `patternSets`
 * replace the defaults wholesale.
 */
export const resolveProjectConfig = (
  overrides: Record<string, unknown>,
  base: ProjectConfig = defaultProjectConfig,
): ProjectConfig => {
  const merged = deepMerge({ ...base }, overrides);
  const result = projectConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new TakeoffError(
      'INVALID_CONFIG',
      'Project configuration failed validation',
      formatIssues(result.error.issues),
    );
  }
  return result.data;
};

export const parseProjectConfig = (
  raw: string,
  base: ProjectConfig = defaultProjectConfig,
): ProjectConfig =>
  resolveProjectConfig(parseStructuredPayload(raw, 'INVALID_CONFIG', 'Project configuration'), base);

export const loadProjectConfig = async (
  path: string | undefined = config.projectConfigPath,
): Promise<ProjectConfig> => {
  if (!path) {
    return defaultProjectConfig;
  }

  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    log.error(`Unable to read project configuration ${path}`, describeError(error));
    throw new TakeoffError('INVALID_CONFIG', `Unable to read project configuration at ${path}`);
  }

  try {
    const parsed = parseProjectConfig(raw);
    log.info(`Loaded project configuration "${parsed.name}" from ${path}`);
    return parsed;
  } catch (error) {
    log.error(`Rejected project configuration ${path}`, describeError(error));
    throw error;
  }
};
