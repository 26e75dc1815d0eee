/* eslint-disable no-console */
/**
 * CLI logging utility with colors and formatting
 */

// ANSI color support - respects NO_COLOR env var and non-TTY
const USE_COLOR = !process.env.NO_COLOR && process.stdout.isTTY !== false;

const paint = (code: string) => (USE_COLOR ? code : '');
const RESET = paint('\x1b[0m');
const GREEN = paint('\x1b[32m');
const RED = paint('\x1b[31m');
const YELLOW = paint('\x1b[33m');
const BLUE = paint('\x1b[34m');
const BOLD = paint('\x1b[1m');
const DIM = paint('\x1b[2m');

let quiet = false;

export const logger = {
  /** Suppress info, success, section and progress output (errors and warnings still print) */
  setQuiet(value: boolean): void {
    quiet = value;
  },

  info(message: string): void {
    if (quiet) return;
    console.log(`${BLUE}ℹ ${message}${RESET}`);
  },

  success(message: string): void {
    if (quiet) return;
    console.log(`${GREEN}✓ ${message}${RESET}`);
  },

  error(message: string): void {
    console.error(`${RED}✗ ${message}${RESET}`);
  },

  warn(message: string): void {
    console.warn(`${YELLOW}⚠ ${message}${RESET}`);
  },

  debug(message: string): void {
    if (process.env.DEBUG) {
      console.log(`${DIM}🔍 ${message}${RESET}`);
    }
  },

  /** Unadorned output, e.g. a generated script or JSON; never suppressed */
  log(message: string): void {
    console.log(message);
  },

  newline(): void {
    if (quiet) return;
    console.log();
  },

  section(title: string): void {
    if (quiet) return;
    console.log();
    console.log(`${BOLD}━━━ ${title} ━━━${RESET}`);
  },

  progress(current: number, total: number, item: string): void {
    if (quiet) return;
    console.log(`${DIM}[${current}/${total}]${RESET} ${item}`);
  },

  /** Aligned `label: value` line used by the describe command */
  field(label: string, value: string | number): void {
    console.log(`  ${BOLD}${label.padEnd(16)}${RESET}${value}`);
  },
};
