import { TOKEN_ENV_VARS } from '../constants';
import { LogLevel } from '../enums';
import { getOptionalEnvVar } from './env-util';
import { log } from './log-util';
import type { PrStatsConfig } from './config-util';

/**
 * Picks the GitHub token for this run: the `--token` flag first, then the
 * environment, then the config file. Returns undefined for anonymous access.
 *
 * @param flagToken - the value passed with `--token`, if any
 * @param config - the loaded configuration file
 */
export const resolveToken = (
  flagToken: string | undefined,
  config: Pick<PrStatsConfig, 'token'>,
): string | undefined => {
  if (flagToken?.trim()) {
    log('resolveToken', LogLevel.INFO, 'Using token from --token');
    return flagToken.trim();
  }

  for (const envVar of TOKEN_ENV_VARS) {
    const value = getOptionalEnvVar(envVar);
    if (value) {
      log('resolveToken', LogLevel.INFO, `Using token from ${envVar}`);
      return value;
    }
  }

  if (config.token) {
    log('resolveToken', LogLevel.INFO, 'Using token from config file');
    return config.token;
  }

  log(
    'resolveToken',
    LogLevel.INFO,
    'No GitHub token found, requests are anonymous and rate limited more strictly',
  );
  return undefined;
};
