/**
 * ANSI color utilities for CLI output
 */

export const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',
  bgRed: '\x1b[41m',
};

/**
 * Semantic color helpers
 */
export const c = {
  title: (s: string) => `${colors.bold}${colors.cyan}${s}${colors.reset}`,
  warning: (s: string) => `${colors.yellow}${s}${colors.reset}`,
  error: (s: string) => `${colors.bgRed}${colors.white} ${s} ${colors.reset}`,
  dim: (s: string) => `${colors.dim}${s}${colors.reset}`,
  path: (s: string) => `${colors.gray}${s}${colors.reset}`,
};
