import type { PluginParameter, RegistrySnapshot } from '../plugins/types.js';

export interface JsonSchemaProperty {
  type?: 'string' | 'number' | 'boolean';
  description?: string;
  default?: string | number | boolean;
  enum?: string[];
}

export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, JsonSchemaProperty>;
  required: string[];
}

export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
}

export interface ToolManifest {
  tools: ToolDescriptor[];
}

/**
 * Projects a registry snapshot into the tool list sent to clients.
 * Ordered by plugin name, then command name.
 */
export function buildManifest(snapshot: RegistrySnapshot): ToolManifest {
  const tools = Array.from(snapshot.tools.values())
    .sort((a, b) => a.plugin.name.localeCompare(b.plugin.name) || a.command.name.localeCompare(b.command.name))
    .map(({ qualifiedName, plugin, command }): ToolDescriptor => {
      const properties: Record<string, JsonSchemaProperty> = {};
      const required: string[] = [];
      for (const parameter of command.parameters) {
        properties[parameter.name] = toSchemaProperty(parameter);
        if (parameter.required) required.push(parameter.name);
      }
      return {
        name: qualifiedName,
        description: command.description || plugin.description || `${command.name} command of ${plugin.name}`,
        inputSchema: { type: 'object', properties, required },
      };
    });

  return { tools };
}

export function toSchemaProperty(parameter: PluginParameter): JsonSchemaProperty {
  const property: JsonSchemaProperty = {};
  switch (parameter.type) {
    case 'string':
      property.type = 'string';
      break;
    case 'number':
      property.type = 'number';
      break;
    case 'boolean':
    case 'flag':
      property.type = 'boolean';
      break;
    case 'unknown':
      break;
  }
  if (parameter.description) property.description = parameter.description;
  if (parameter.default !== undefined) property.default = parameter.default;
  if (parameter.choices && parameter.choices.length > 0) property.enum = [...parameter.choices];
  return property;
}
