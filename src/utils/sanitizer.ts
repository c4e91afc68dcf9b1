/**
 * Display helpers for command lines.
 */

const SAFE_SHELL_ARG = /^[A-Za-z0-9_\-.,:=/+@%]+$/;

/**
 * Quote a single argument the way a POSIX shell would need it.
 * Plain tokens are left as they are.
 */
export function quoteShellArg(arg: string): string {
  if (SAFE_SHELL_ARG.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, "'\\''")}'`;
}

/**
 * Render a command and its arguments as one copy-pasteable line.
 */
export function formatCommandLine(command: string, args: readonly string[]): string {
  return [command, ...args].map(quoteShellArg).join(" ");
}

/**
 * Split a free-form flag string on runs of whitespace.
 */
export function splitFlags(value: string): string[] {
  const trimmed = value.trim();
  return trimmed.length === 0 ? [] : trimmed.split(/\s+/);
}
