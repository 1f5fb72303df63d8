/**
 * Parser for the help text printed by `--help`.
 *
 * Targets argparse output (usage line, `positional arguments:` / `options:` sections,
 * `{a,b} ...` subcommand choices) and tolerates commander-style `Commands:` sections.
 */

import type { ParameterType, ParameterValue, PluginParameter } from './types.js';

export interface HelpEntry {
  signature: string;
  help: string;
  indent: number;
  helpColumn?: number;
}

export interface HelpSection {
  title: string;
  entries: HelpEntry[];
}

export interface ParsedHelp {
  usage: string;
  description: string;
  sections: HelpSection[];
}

export interface CommandSummary {
  name: string;
  description: string;
}

const HELP_FLAGS = new Set(['-h', '--help']);
const NUMERIC_METAVAR = /^(N|NUM|NUMBER|INT|INTEGER|FLOAT|COUNT)$/i;
const COMMAND_NAME = /^[A-Za-z0-9][\w.-]*$/;
const ENTRY_LINE = /^(\s+)(\S.*?)(?:\s{2,}(\S.*))?$/;
const OPTION_PART = /^(--?[A-Za-z0-9][\w-]*)(?:[ =](.+))?$/;
const CONTINUATION_INDENT = 6;

export function parseHelpText(text: string): ParsedHelp {
  const lines = text.replace(/\r\n/g, '\n').split('\n');
  const result: ParsedHelp = { usage: '', description: '', sections: [] };
  let index = 0;

  while (index < lines.length && lines[index].trim().length === 0) index += 1;

  const usageMatch = index < lines.length ? /^usage:\s*(.*)$/i.exec(lines[index].trim()) : null;
  if (usageMatch) {
    const usageParts = [usageMatch[1]];
    index += 1;
    while (index < lines.length && /^\s+\S/.test(lines[index])) {
      usageParts.push(lines[index].trim());
      index += 1;
    }
    result.usage = usageParts.join(' ').replace(/\s+/g, ' ').trim();
  }

  let section: HelpSection | null = null;
  const descriptionLines: string[] = [];
  let descriptionClosed = false;

  for (; index < lines.length; index += 1) {
    const line = lines[index];
    if (line.trim().length === 0) {
      section = null;
      if (descriptionLines.length > 0) descriptionClosed = true;
      continue;
    }

    const header = /^(\S.*?):\s*$/.exec(line);
    if (header) {
      section = { title: header[1].trim().toLowerCase(), entries: [] };
      result.sections.push(section);
      descriptionClosed = true;
      continue;
    }

    if (!/^\s/.test(line)) {
      section = null;
      if (!descriptionClosed && result.sections.length === 0) {
        descriptionLines.push(line.trim());
      }
      continue;
    }

    if (!section) continue;
    appendSectionLine(section, line);
  }

  result.description = descriptionLines.join(' ');
  return result;
}

function appendSectionLine(section: HelpSection, line: string): void {
  const indent = line.search(/\S/);
  const last = section.entries[section.entries.length - 1];
  if (last && isContinuation(last, indent)) {
    last.help = last.help.length > 0 ? `${last.help} ${line.trim()}` : line.trim();
    return;
  }

  const match = ENTRY_LINE.exec(line);
  if (!match) return;
  const help = match[3] ?? '';
  section.entries.push({
    signature: match[2].trim(),
    help: help.trim(),
    indent,
    helpColumn: help.length > 0 ? line.lastIndexOf(help) : undefined,
  });
}

function isContinuation(last: HelpEntry, indent: number): boolean {
  if (last.helpColumn !== undefined) {
    return indent >= last.helpColumn - 1;
  }
  return indent >= last.indent + CONTINUATION_INDENT;
}

export function findSection(help: ParsedHelp, predicate: (title: string) => boolean): HelpSection | undefined {
  return help.sections.find((section) => predicate(section.title));
}

/**
 * Subcommands in declaration order, from the `{a,b} ...` usage choices, the
 * positional `{a,b}` entry, or a `commands:` style section.
 */
export function parseCommandNames(help: ParsedHelp): CommandSummary[] {
  const descriptions = collectCommandDescriptions(help);
  const fromUsage = /\{([^{}\s]+)\}\s+\.\.\./.exec(help.usage);
  const positional = findSection(help, (title) => title.startsWith('positional'));
  const choiceEntry = positional?.entries.find((entry) => /^\{[^{}\s]+\}$/.test(entry.signature));

  let names: string[] = [];
  if (fromUsage) {
    names = splitChoices(fromUsage[1]);
  } else if (choiceEntry) {
    names = splitChoices(choiceEntry.signature.slice(1, -1));
  } else {
    names = Array.from(descriptions.keys());
  }

  const seen = new Set<string>();
  const commands: CommandSummary[] = [];
  for (const name of names) {
    if (!COMMAND_NAME.test(name) || seen.has(name)) continue;
    seen.add(name);
    commands.push({ name, description: descriptions.get(name) ?? '' });
  }
  return commands;
}

function collectCommandDescriptions(help: ParsedHelp): Map<string, string> {
  const descriptions = new Map<string, string>();
  const positional = findSection(help, (title) => title.startsWith('positional'));
  if (positional) {
    const choiceIndex = positional.entries.findIndex((entry) => entry.signature.startsWith('{'));
    if (choiceIndex >= 0) {
      const parentIndent = positional.entries[choiceIndex].indent;
      for (const entry of positional.entries.slice(choiceIndex + 1)) {
        if (entry.indent <= parentIndent) break;
        descriptions.set(entry.signature, entry.help);
      }
    }
  }

  for (const section of help.sections) {
    if (!/(^|\s|sub)commands$/.test(section.title)) continue;
    for (const entry of section.entries) {
      const name = entry.signature.split(/\s+/)[0];
      if (!COMMAND_NAME.test(name) || name === 'help' || descriptions.has(name)) continue;
      descriptions.set(name, entry.help);
    }
  }
  return descriptions;
}

function splitChoices(raw: string): string[] {
  return raw.split(',').map((item) => item.trim()).filter((item) => item.length > 0);
}

/**
 * Options and positionals of a single command's help text. `-h/--help` is skipped.
 */
export function parseCommandParameters(help: ParsedHelp): PluginParameter[] {
  const parameters: PluginParameter[] = [];
  const seen = new Set<string>();

  for (const section of help.sections) {
    if (section.title.startsWith('positional')) {
      for (const entry of section.entries) {
        const parameter = parsePositionalEntry(entry, help.usage);
        if (parameter && !seen.has(parameter.name)) {
          seen.add(parameter.name);
          parameters.push(parameter);
        }
      }
      continue;
    }

    const requiredSection = section.title.includes('required');
    for (const entry of section.entries) {
      if (!entry.signature.startsWith('-')) continue;
      const parameter = parseOptionEntry(entry, help.usage, requiredSection);
      if (parameter && !seen.has(parameter.name)) {
        seen.add(parameter.name);
        parameters.push(parameter);
      }
    }
  }

  return parameters;
}

function parseOptionEntry(entry: HelpEntry, usage: string, requiredSection: boolean): PluginParameter | null {
  const flags: string[] = [];
  let metavar: string | undefined;

  for (const part of entry.signature.split(/,\s+/)) {
    const match = OPTION_PART.exec(part.trim());
    if (!match) continue;
    flags.push(match[1]);
    if (match[2]) metavar = match[2].trim();
  }

  if (flags.length === 0 || flags.some((flag) => HELP_FLAGS.has(flag))) return null;

  const flag = flags.find((item) => item.startsWith('--')) ?? flags[0];
  const typed = inferOptionType(metavar);
  const parameter: PluginParameter = {
    name: flag.replace(/^-+/, ''),
    type: typed.type,
    required: requiredSection || flags.some((item) => isTopLevelInUsage(usage, item)),
    kind: 'option',
    flag,
  };

  if (typed.choices) parameter.choices = typed.choices;
  applyHelpText(parameter, entry.help);
  return parameter;
}

function parsePositionalEntry(entry: HelpEntry, usage: string): PluginParameter | null {
  const signature = entry.signature.split(/\s+/)[0];
  if (signature.startsWith('{') || signature.startsWith('-') || !/^[A-Za-z_][\w-]*$/.test(signature) || entry.indent > 2) {
    return null;
  }

  const parameter: PluginParameter = {
    name: signature,
    type: entry.signature.includes('...') ? 'unknown' : 'string',
    required: isPositionalRequired(usage, signature),
    kind: 'positional',
  };
  applyHelpText(parameter, entry.help);
  return parameter;
}

function applyHelpText(parameter: PluginParameter, help: string): void {
  if (help.length === 0) return;
  parameter.description = help;
  const defaultMatch = /\(default:\s*(.*?)\)\s*$/.exec(help);
  if (defaultMatch) {
    const value = coerceDefault(defaultMatch[1], parameter.type);
    if (value !== undefined) parameter.default = value;
  }
}

function inferOptionType(metavar: string | undefined): { type: ParameterType; choices?: string[] } {
  if (metavar === undefined) return { type: 'flag' };

  if (metavar.includes('...') || metavar.startsWith('[')) return { type: 'unknown' };

  const choicesMatch = /^\{(.+)\}$/.exec(metavar);
  if (choicesMatch) {
    const choices = splitChoices(choicesMatch[1]);
    const lowered = choices.map((item) => item.toLowerCase()).sort();
    if (lowered.length === 2 && lowered[0] === 'false' && lowered[1] === 'true') {
      return { type: 'boolean' };
    }
    return { type: 'string', choices };
  }

  if (NUMERIC_METAVAR.test(metavar.replace(/^<(.+)>$/, '$1'))) return { type: 'number' };
  return { type: 'string' };
}

export function coerceDefault(raw: string, type: ParameterType): ParameterValue | undefined {
  const value = raw.trim();
  if (value.length === 0 || value === 'None' || value === 'null') return undefined;

  switch (type) {
    case 'number': {
      const parsed = Number(value);
      return Number.isFinite(parsed) ? parsed : undefined;
    }
    case 'boolean':
    case 'flag':
      if (/^(true|1|yes)$/i.test(value)) return true;
      if (/^(false|0|no)$/i.test(value)) return false;
      return undefined;
    default:
      return value.replace(/^(['"])(.*)\1$/, '$2');
  }
}

/** True when `token` occurs in the usage line outside any `[...]` or `(...)` group. */
export function isTopLevelInUsage(usage: string, token: string): boolean {
  return findUsageDepths(usage, token).some((depth) => depth === 0);
}

function isPositionalRequired(usage: string, name: string): boolean {
  const depths = findUsageDepths(usage, name);
  if (depths.length === 0) return true;
  return depths.some((depth) => depth === 0);
}

function findUsageDepths(usage: string, token: string): number[] {
  const depths: number[] = [];
  let from = 0;
  while (from <= usage.length) {
    const position = usage.indexOf(token, from);
    if (position < 0) break;
    from = position + token.length;

    const before = position === 0 ? ' ' : usage[position - 1];
    const after = from >= usage.length ? ' ' : usage[from];
    if (!/[\s[(|]/.test(before) || !/[\s\])|=]/.test(after)) continue;

    let depth = 0;
    for (const char of usage.slice(0, position)) {
      if (char === '[' || char === '(') depth += 1;
      else if (char === ']' || char === ')') depth = Math.max(0, depth - 1);
    }
    depths.push(depth);
  }
  return depths;
}
