import type { PluginCommand, PluginParameter } from '../plugins/types.js';

/**
 * Turns a tool-call argument object into the argv tail for `<command>`.
 *
 * Options come first as a single `--flag=value` token, so values starting with
 * `-` are not read as options; positionals follow a `--` in declared order.
 * Keys the command does not declare are forwarded as `--key=value`.
 */
export function encodeArguments(command: PluginCommand, args: Record<string, unknown>): string[] {
  const byName = new Map<string, PluginParameter>();
  for (const parameter of command.parameters) byName.set(parameter.name, parameter);

  const options: string[] = [];
  const positionals: string[] = [];

  for (const [key, value] of Object.entries(args)) {
    if (value === undefined || value === null) continue;
    const parameter = byName.get(key);

    if (parameter?.kind === 'positional') continue;

    const flag = parameter?.flag ?? `--${key}`;
    if (parameter?.type === 'flag') {
      if (isTruthy(value)) options.push(flag);
      continue;
    }
    if (Array.isArray(value)) {
      for (const item of value) {
        if (item === undefined || item === null) continue;
        options.push(`${flag}=${stringifyValue(item)}`);
      }
      continue;
    }
    options.push(`${flag}=${stringifyValue(value)}`);
  }

  for (const parameter of command.parameters) {
    if (parameter.kind !== 'positional') continue;
    const value = args[parameter.name];
    if (value === undefined || value === null) continue;
    if (Array.isArray(value)) {
      for (const item of value) {
        if (item !== undefined && item !== null) positionals.push(stringifyValue(item));
      }
      continue;
    }
    positionals.push(stringifyValue(value));
  }

  return positionals.length > 0 ? [...options, '--', ...positionals] : options;
}

export function stringifyValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number' || typeof value === 'bigint') return String(value);
  return JSON.stringify(value);
}

function isTruthy(value: unknown): boolean {
  if (typeof value === 'string') return value.length > 0 && !/^(false|0|no)$/i.test(value);
  return Boolean(value);
}
