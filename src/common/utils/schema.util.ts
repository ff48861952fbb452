import { ParameterSchema } from '../../cloudcode/interfaces';
import { isRecord } from './object.util';

function stringEntries(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter((entry): entry is string => typeof entry === 'string');
}

/**
 * Picks the branch of an `anyOf` / `oneOf` union to keep. Array branches win
 * because unions mostly express "a value or a list of values"; otherwise the
 * first branch is used and the rest are lost.
 */
function selectUnionBranch(
  schema: Record<string, unknown>,
): Record<string, unknown> | undefined {
  const union = Array.isArray(schema.anyOf)
    ? schema.anyOf
    : Array.isArray(schema.oneOf)
      ? schema.oneOf
      : undefined;
  if (!union) return undefined;

  const branches = union.filter(isRecord);
  const branch = branches.find((b) => b.type === 'array') ?? branches[0];
  if (!branch) return undefined;

  if (typeof schema.description === 'string' && branch.description === undefined) {
    return { ...branch, description: schema.description };
  }
  return branch;
}

/**
 * Converts a JSON-Schema-like value into the CloudCode parameter schema.
 * Only type, description, required, enum, properties and items survive.
 */
export function convertSchema(schema: unknown): ParameterSchema | undefined {
  if (!isRecord(schema)) return undefined;

  const branch = selectUnionBranch(schema);
  if (branch) {
    return convertSchema(branch);
  }

  const output: ParameterSchema = {};

  if (typeof schema.type === 'string') {
    output.type = schema.type.toUpperCase();
  }
  if (typeof schema.description === 'string') {
    output.description = schema.description;
  }

  const required = stringEntries(schema.required);
  if (required && required.length > 0) {
    output.required = required;
  }

  const enumValues = stringEntries(schema.enum);
  if (enumValues && enumValues.length > 0) {
    output.enum = enumValues;
  }

  if (isRecord(schema.properties)) {
    const properties: Record<string, ParameterSchema> = {};
    for (const [key, value] of Object.entries(schema.properties)) {
      const converted = convertSchema(value);
      if (converted) {
        properties[key] = converted;
      }
    }
    output.properties = properties;
  }

  const items = convertSchema(schema.items);
  if (items) {
    output.items = items;
  }

  return output;
}
