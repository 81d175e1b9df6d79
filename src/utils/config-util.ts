import fs from 'fs-extra';
import { parse } from 'yaml';
import { z } from 'zod';

import { MAX_SEARCH_PAGES } from '../constants';
import { LogLevel } from '../enums';
import { ConfigError } from '../errors';
import { log } from './log-util';

export const configSchema = z
  .object({
    token: z.string().trim().min(1).optional(),
    apiBaseUrl: z.string().url().optional(),
    perPage: z.number().int().min(1).max(100).optional(),
    maxPages: z.number().int().min(1).max(MAX_SEARCH_PAGES).optional(),
  })
  .strict();

export type PrStatsConfig = z.infer<typeof configSchema>;

const formatIssues = (error: z.ZodError) =>
  error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message,
    )
    .join('; ');

/**
 * Parses and validates the YAML text of a configuration file.
 * An empty document is an empty configuration.
 *
 * @param path - where the text came from, used in error messages
 */
export const parseConfig = (path: string, text: string): PrStatsConfig => {
  let document: unknown;
  try {
    document = parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(path, reason, { cause: error });
  }

  const result = configSchema.safeParse(document ?? {});
  if (!result.success) {
    throw new ConfigError(path, formatIssues(result.error));
  }
  return result.data;
};

/**
 * Loads the configuration file at `path`. A missing file yields an empty
 * configuration unless the caller named the file explicitly.
 */
export const loadConfig = (
  path: string,
  { required }: { required: boolean },
): PrStatsConfig => {
  if (!fs.pathExistsSync(path)) {
    if (required) throw new ConfigError(path, 'file not found');
    log('loadConfig', LogLevel.INFO, `No config file at ${path}, using defaults`);
    return {};
  }

  log('loadConfig', LogLevel.INFO, `Reading config from ${path}`);
  return parseConfig(path, fs.readFileSync(path, 'utf8'));
};
