import type { SchemaNode, SchemaType } from '@inferlab/shared-types';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export const PLACEHOLDER_STRING = 'mock_string';

const SCHEMA_TYPES: readonly SchemaType[] = ['OBJECT', 'ARRAY', 'STRING', 'BOOLEAN', 'INTEGER', 'NUMBER'];

export function resolveSchemaType(node: SchemaNode): SchemaType | undefined {
  if (node.type === undefined) {
    return 'OBJECT';
  }
  const normalized = node.type.toUpperCase();
  return SCHEMA_TYPES.find(type => type === normalized);
}

/**
 * Builds a value that satisfies `node`. Output depends only on the node:
 * objects keep declaration order, arrays hold exactly one item, strings take
 * the first enum value when one is declared.
 */
export function synthesizeFromSchema(node: SchemaNode | undefined): JsonValue {
  if (!node || Object.keys(node).length === 0) {
    return {};
  }

  switch (resolveSchemaType(node)) {
    case 'OBJECT': {
      const result: JsonObject = {};
      for (const [key, propertySchema] of Object.entries(node.properties ?? {})) {
        result[key] = synthesizeFromSchema(propertySchema);
      }
      return result;
    }
    case 'ARRAY':
      return [synthesizeFromSchema(node.items)];
    case 'STRING':
      return node.enum && node.enum.length > 0 ? node.enum[0] : PLACEHOLDER_STRING;
    case 'BOOLEAN':
      return false;
    case 'INTEGER':
      return 1;
    case 'NUMBER':
      return 1.0;
    default:
      return {};
  }
}

export function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isEmptyDocument(value: JsonValue): boolean {
  return isJsonObject(value) && Object.keys(value).length === 0;
}
