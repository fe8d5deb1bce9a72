/* eslint-disable no-console */
/**
 * CLI logging with ANSI colors. Status lines go to stdout, errors and
 * warnings to stderr; command output meant for piping uses `console.log`
 * directly.
 */

// Respects NO_COLOR and non-TTY output
const USE_COLOR = !process.env.NO_COLOR && process.stdout.isTTY !== false;

const RESET = USE_COLOR ? '\x1b[0m' : '';
const GREEN = USE_COLOR ? '\x1b[32m' : '';
const RED = USE_COLOR ? '\x1b[31m' : '';
const YELLOW = USE_COLOR ? '\x1b[33m' : '';
const BLUE = USE_COLOR ? '\x1b[34m' : '';
const BOLD = USE_COLOR ? '\x1b[1m' : '';
const DIM = USE_COLOR ? '\x1b[2m' : '';

export const logger = {
  info(message: string): void {
    console.log(`${BLUE}ℹ ${message}${RESET}`);
  },

  success(message: string): void {
    console.log(`${GREEN}✓ ${message}${RESET}`);
  },

  error(message: string): void {
    console.error(`${RED}✗ ${message}${RESET}`);
  },

  warn(message: string): void {
    console.warn(`${YELLOW}⚠ ${message}${RESET}`);
  },

  /** Only printed when DEBUG is set */
  debug(message: string): void {
    if (process.env.DEBUG) {
      console.log(`${DIM}… ${message}${RESET}`);
    }
  },

  newline(): void {
    console.log();
  },

  section(title: string): void {
    console.log();
    console.log(`${BOLD}━━━ ${title} ━━━${RESET}`);
  },

  progress(current: number, total: number, item: string): void {
    console.log(`${DIM}[${current}/${total}]${RESET} ${item}`);
  },
};
