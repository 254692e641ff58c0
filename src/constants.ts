export const GITHUB_CONSTANTS = {
  API_URL: "https://api.github.com",
  FORKS_PATH: "/user/repos",
  FORK_TYPE: "fork",
  PER_PAGE: 100,
  USER_AGENT: "fork-sync",
} as const;

export const ENV_VARS = {
  USERNAME: "GITHUB_USERNAME",
  TOKEN: "GITHUB_TOKEN",
  API_URL: "GITHUB_API_URL",
  ERROR_LOG: "FORK_SYNC_ERROR_LOG",
} as const;

export const DEFAULT_CONFIG = {
  ERROR_LOG_FILE: "error.log",
  MAX_CONCURRENT_PULL_REQUESTS: 1,
} as const;

export const MENU_OPTIONS = {
  LIST_FORKS: "1",
  LIST_BRANCHES: "2",
  SYNC_ONE: "3",
  SYNC_ALL: "4",
  EXIT: "5",
} as const;

export const MENU_TITLE = "GitHub Fork Management Menu";

export const MENU_ENTRIES = [
  `${MENU_OPTIONS.LIST_FORKS}. List all forks`,
  `${MENU_OPTIONS.LIST_BRANCHES}. List branches in a fork`,
  `${MENU_OPTIONS.SYNC_ONE}. Sync branches for a specific fork`,
  `${MENU_OPTIONS.SYNC_ALL}. Sync branches for all forks`,
  `${MENU_OPTIONS.EXIT}. Exit`,
] as const;

export const ERROR_MESSAGES = {
  MISSING_CREDENTIALS: `Set ${ENV_VARS.USERNAME} and ${ENV_VARS.TOKEN} in your shell profile before running fork-sync.`,
  NO_FORKS: "No forks found.",
  NO_BRANCHES: "No branches found.",
  INVALID_CHOICE: "Invalid choice.",
  INVALID_SELECTION: "Invalid selection.",
  NO_UPSTREAM: "Original repository not found.",
} as const;
