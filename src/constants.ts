export const GITHUB_API = 'https://api.github.com';

export const USER_AGENT = 'pr-stats';

export const DEFAULT_CONFIG_PATH = 'pr-stats.yml';

// The search API never returns more than 1000 results for one query.
export const MAX_SEARCH_PAGES = 10;

export const DEFAULT_PER_PAGE = 100;

export const TOKEN_ENV_VARS = ['GITHUB_TOKEN', 'GH_TOKEN'];

export const SEPARATOR = '─'.repeat(60);

export const NOT_MERGED = 'Not merged yet';
