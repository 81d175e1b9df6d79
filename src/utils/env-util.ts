import { log } from './log-util';
import { LogLevel } from '../enums';
import { ConfigError } from '../errors';

/**
 * Checks that a given environment variable exists, and returns
 * its value if it does. Throws when it is missing and no default is given.
 *
 * @param envVar - the environment variable to retrieve
 * @param defaultValue - default value to use if no environment var is found
 * @returns the value of the env var being checked, or the default value if one is passed
 */
export function getEnvVar(envVar: string, defaultValue?: string): string {
  log('getEnvVar', LogLevel.INFO, `Fetching env var '${envVar}'`);

  const value = process.env[envVar] || defaultValue;
  if (value === undefined) {
    log('getEnvVar', LogLevel.ERROR, `Missing environment variable '${envVar}'`);
    throw new ConfigError('environment', `missing variable '${envVar}'`);
  }
  return value;
}

/**
 * Like getEnvVar, but empty and unset variables both come back as undefined.
 */
export function getOptionalEnvVar(envVar: string): string | undefined {
  const value = process.env[envVar]?.trim();
  return value ? value : undefined;
}
