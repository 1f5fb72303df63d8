export type ParameterType = 'string' | 'number' | 'boolean' | 'flag' | 'unknown';
export type ParameterKind = 'option' | 'positional';
export type ParameterValue = string | number | boolean;

export interface PluginParameter {
  name: string;
  type: ParameterType;
  required: boolean;
  kind: ParameterKind;
  /** Command-line spelling for options, e.g. `--param`. Absent for positionals. */
  flag?: string;
  default?: ParameterValue;
  description?: string;
  choices?: string[];
}

export interface PluginCommand {
  name: string;
  description: string;
  parameters: readonly PluginParameter[];
}

export interface Plugin {
  name: string;
  executablePath: string;
  /** argv prefix that runs the plugin: optional interpreter followed by the executable. */
  invocation: readonly string[];
  cwd: string;
  description: string;
  commands: readonly PluginCommand[];
}

export interface PluginCandidate {
  name: string;
  executablePath: string;
}

export type IntrospectionErrorCode = 'not_found' | 'not_executable' | 'help_failed' | 'timeout' | 'unparsable';

export class IntrospectionError extends Error {
  constructor(
    message: string,
    public readonly code: IntrospectionErrorCode,
    public readonly executablePath: string,
  ) {
    super(message);
    this.name = 'IntrospectionError';
  }
}

export interface DiscoveryFailure {
  plugin: string;
  executablePath: string;
  code: IntrospectionErrorCode | 'duplicate';
  message: string;
}

export interface ResolvedTool {
  qualifiedName: string;
  plugin: Plugin;
  command: PluginCommand;
}

export interface RegistrySnapshot {
  readonly directory: string;
  readonly scannedAt: string;
  readonly plugins: readonly Plugin[];
  readonly failures: readonly DiscoveryFailure[];
  readonly tools: ReadonlyMap<string, ResolvedTool>;
}

export function qualifyToolName(pluginName: string, commandName: string): string {
  return `${pluginName}.${commandName}`;
}
