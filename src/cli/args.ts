/**
 * Positional argument handling: task names and VAR=value overrides.
 */

const OVERRIDE_PATTERN = /^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/s;

export interface IPartitionedArguments {
  readonly targets: readonly string[];
  readonly overrides: Readonly<Record<string, string>>;
}

/**
 * Separate `NAME=value` overrides from task names, keeping task order.
 * A later override of the same name wins.
 */
export function partitionArguments(args: readonly string[]): IPartitionedArguments {
  const targets: string[] = [];
  const overrides: Record<string, string> = {};

  for (const arg of args) {
    const match = OVERRIDE_PATTERN.exec(arg);
    const name = match?.[1];
    const value = match?.[2];
    if (name !== undefined && value !== undefined) {
      overrides[name] = value;
    } else {
      targets.push(arg);
    }
  }

  return { targets, overrides };
}
