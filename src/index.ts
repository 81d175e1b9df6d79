import { Command, CommanderError } from 'commander';

import {
  DEFAULT_CONFIG_PATH,
  DEFAULT_PER_PAGE,
  GITHUB_API,
  MAX_SEARCH_PAGES,
  USER_AGENT,
} from './constants';
import { ExitCode, LogLevel } from './enums';
import { PrStatsError, UsageError } from './errors';
import type { CliOptions, ClientOptions, SearchClient } from './interfaces';
import { createClient, fetchPullRequests } from './operations/fetch-pull-requests';
import { filterPullRequests } from './operations/filter-pull-requests';
import { groupByRepository } from './operations/group-pull-requests';
import { parseCriteria } from './operations/parse-criteria';
import { type LineWriter, printReport } from './operations/print-report';
import { loadConfig } from './utils/config-util';
import { getEnvVar } from './utils/env-util';
import { log, setLogLevel } from './utils/log-util';
import { resolveToken } from './utils/token-util';

export interface RunDependencies {
  createClient?: (options: ClientOptions) => SearchClient;
  writeOut?: LineWriter;
  writeErr?: (text: string) => void;
}

export const buildProgram = () =>
  new Command()
    .name('pr-stats')
    .description("List a GitHub user's pull requests in a date range, grouped by repository")
    .version('1.0.0')
    .requiredOption('--user <login>', 'GitHub username to fetch PRs for')
    .requiredOption('--start <date>', 'start date (YYYY-MM-DD), inclusive')
    .requiredOption('--end <date>', 'end date (YYYY-MM-DD), inclusive')
    .option('--label <name>', 'only list PRs carrying this label')
    .option('--token <token>', 'GitHub token (or set GITHUB_TOKEN)')
    .option('--config <path>', `YAML config file (default: ${DEFAULT_CONFIG_PATH})`)
    .option('--verbose', 'log progress to stderr');

/**
 * Runs the tool once for the given arguments (without the node and script
 * entries) and resolves to the process exit code.
 */
export async function run(
  args: string[],
  deps: RunDependencies = {},
): Promise<ExitCode> {
  const writeErr = deps.writeErr ?? ((text: string) => process.stderr.write(text));
  const program = buildProgram()
    .exitOverride()
    .configureOutput({ writeErr });

  try {
    program.parse(args, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version also end parsing through here, with exit code 0.
      return error.exitCode === 0 ? ExitCode.SUCCESS : ExitCode.USAGE;
    }
    throw error;
  }

  const options = program.opts<CliOptions>();
  if (options.verbose) setLogLevel(LogLevel.INFO);

  try {
    const criteria = parseCriteria(options);
    const config = loadConfig(
      options.config ?? getEnvVar('PR_STATS_CONFIG', DEFAULT_CONFIG_PATH),
      { required: options.config !== undefined },
    );

    const client = (deps.createClient ?? createClient)({
      token: resolveToken(options.token, config),
      baseUrl: config.apiBaseUrl ?? GITHUB_API,
      userAgent: USER_AGENT,
    });
    const fetched = await fetchPullRequests(client, criteria, {
      perPage: config.perPage ?? DEFAULT_PER_PAGE,
      maxPages: config.maxPages ?? MAX_SEARCH_PAGES,
    });

    const matching = filterPullRequests(fetched, criteria);
    printReport(criteria, groupByRepository(matching), deps.writeOut);
    return ExitCode.SUCCESS;
  } catch (error) {
    if (!(error instanceof PrStatsError)) throw error;

    log('run', LogLevel.ERROR, error.message);
    if (error instanceof UsageError) {
      writeErr(`Run '${program.name()} --help' for usage.\n`);
    }
    return error.exitCode;
  }
}
