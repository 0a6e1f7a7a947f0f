// jsonToStruct.ts
// Pure TypeScript library for converting a JSON sample to C++ struct declarations

import { resolveOptions, type GenerateOptions } from './config';
import { UnsupportedShapeError } from './errors';
import { decodeJson, type JsonValue } from './jsonValue';
import { logWarning } from './logger';
import {
  elementTypeOf,
  generateDescriptorFromJson,
  generateStruct,
  renderType,
  type StructDescriptor,
} from './structDescriptorGenerator';

export interface JsonToStructResult {
  source: string;
  warnings: string[];
}

/**
 * Picks the object whose shape becomes the root struct. A top-level array must
 * hold only objects and is represented by its first element.
 */
function selectRootObject(document: JsonValue): ReadonlyMap<string, JsonValue> {
  switch (document.kind) {
    case 'object':
      return document.entries;
    case 'array': {
      if (document.items.length === 0) {
        throw new UnsupportedShapeError('empty array');
      }
      const kinds = Array.from(new Set(document.items.map(item => item.kind)));
      const first = document.items[0];
      if (kinds.length > 1 || first.kind !== 'object') {
        throw new UnsupportedShapeError(`unexpected type: array of ${kinds.join(', ')}`);
      }
      return first.entries;
    }
    default:
      throw new UnsupportedShapeError(`unexpected type: ${document.kind}`);
  }
}

function collectWarnings(struct: StructDescriptor, path: string, warnings: string[]): string[] {
  for (const field of struct.fields) {
    const fieldPath = `${path}.${field.sourceKey}`;
    const element = elementTypeOf(field.type);
    if (element.kind === 'unknown') {
      warnings.push(`Ambiguous: ${fieldPath} (${element.reason}) is rendered as ${renderType(field.type)}`);
    } else if (element.kind === 'struct') {
      collectWarnings(element.struct, fieldPath, warnings);
    }
  }
  return warnings;
}

/**
 * Generates struct declarations for a JSON document.
 *
 * @throws DecodeError if `input` is not valid JSON
 * @throws UnsupportedShapeError if the document is not an object or a non-empty array of objects
 * @throws OptionsError if `options` fail validation
 */
export function generate(input: string, options: GenerateOptions = {}): JsonToStructResult {
  const { structName, inferIntegers, indent } = resolveOptions(options);
  const root = selectRootObject(decodeJson(input));

  const descriptor = generateDescriptorFromJson(structName, root, { inferIntegers });
  const source = generateStruct(descriptor, { indent });
  const warnings = collectWarnings(descriptor, descriptor.name, []);
  for (const warning of warnings) {
    logWarning('inference', warning);
  }
  return { source, warnings };
}
