// ANSI color codes
export const colors = {
  reset: '\x1b[0m',
  green: '\x1b[32m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  blue: '\x1b[34m'
} as const;

// Symbols
export const symbols = {
  success: '✓',
  error: '✗',
  warning: '⚠',
  info: 'ℹ'
} as const;

export type Color = keyof typeof colors;

/**
 * Wrap a message in an ANSI color (no-op for `reset`).
 */
export function colorize(message: string, color: Color = 'reset'): string {
  if (color === 'reset') return message;
  return `${colors[color]}${message}${colors.reset}`;
}

/**
 * Print colored message to console
 */
export function print(message: string, color: Color = 'reset'): void {
  console.log(colorize(message, color));
}

/**
 * Render a command the way a shell user would type it.
 */
export function formatCommand(file: string, args: readonly string[]): string {
  return [file, ...args].map((part) => (/^[\w@%+=:,./-]+$/.test(part) ? part : `'${part.replace(/'/g, `'\\''`)}'`)).join(' ');
}
