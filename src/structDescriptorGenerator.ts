import { CPP_SYNTAX, type ScalarKind, type TargetSyntax } from './cppSyntax';
import { formatFieldName, formatTypeName } from './fieldNameUtil';
import type { JsonValue } from './jsonValue';
import { logDebug } from './logger';

export type UnknownReason = 'null value' | 'empty array' | 'mixed element types';

export type TypeDescriptor =
  | { kind: 'scalar'; scalar: ScalarKind }
  | { kind: 'struct'; struct: StructDescriptor }
  | { kind: 'array'; element: TypeDescriptor }
  | { kind: 'unknown'; reason: UnknownReason };

export interface FieldDescriptor {
  readonly sourceKey: string;
  readonly identifier: string;
  readonly type: TypeDescriptor;
}

export interface StructDescriptor {
  readonly name: string;
  readonly fields: readonly FieldDescriptor[];
}

// Byte order of the UTF-8 encodings, i.e. code point order
function compareKeys(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8'));
}

/**
 * Reserves a struct name inside one parent declaration: Foo, Foo2, Foo3...
 */
function reserveTypeName(base: string, taken: Set<string>): string {
  let name = base;
  for (let n = 2; taken.has(name); n++) {
    name = `${base}${n}`;
  }
  taken.add(name);
  return name;
}

/**
 * Strips array wrappers: the type of the innermost element.
 */
export function elementTypeOf(type: TypeDescriptor): TypeDescriptor {
  return type.kind === 'array' ? elementTypeOf(type.element) : type;
}

/**
 * Infers a struct descriptor from the entries of a JSON object.
 * Arrays of objects are typed after their first element only.
 */
export function generateDescriptorFromJson(
  structName: string,
  entries: ReadonlyMap<string, JsonValue>,
  options?: { inferIntegers?: boolean }
): StructDescriptor {
  const inferIntegers = options?.inferIntegers ?? false;

  function numberKind(values: readonly number[]): ScalarKind {
    return inferIntegers && values.every(v => Number.isInteger(v)) ? 'int64' : 'float64';
  }

  // `typeNames` holds the struct names already declared in the enclosing struct
  function inferFieldType(value: JsonValue, key: string, typeNames: Set<string>): TypeDescriptor {
    switch (value.kind) {
      case 'null': return { kind: 'unknown', reason: 'null value' };
      case 'boolean': return { kind: 'scalar', scalar: 'boolean' };
      case 'string': return { kind: 'scalar', scalar: 'string' };
      case 'number': return { kind: 'scalar', scalar: numberKind([value.value]) };
      case 'array': return inferArrayType(value.items, key, typeNames);
      case 'object': {
        const name = reserveTypeName(formatTypeName(key), typeNames);
        return { kind: 'struct', struct: buildStructDescriptor(value.entries, name) };
      }
    }
  }

  function inferArrayType(items: readonly JsonValue[], key: string, typeNames: Set<string>): TypeDescriptor {
    if (items.length === 0) {
      return { kind: 'array', element: { kind: 'unknown', reason: 'empty array' } };
    }
    // Mixed arrays are not decomposed into a union
    const kinds = new Set(items.map(item => item.kind));
    if (kinds.size > 1) {
      return { kind: 'array', element: { kind: 'unknown', reason: 'mixed element types' } };
    }

    const first = items[0];
    if (first.kind === 'number') {
      // int64 only when every element is integral
      const values = items.flatMap(item => (item.kind === 'number' ? [item.value] : []));
      return { kind: 'array', element: { kind: 'scalar', scalar: numberKind(values) } };
    }
    return { kind: 'array', element: inferFieldType(first, key, typeNames) };
  }

  function buildStructDescriptor(obj: ReadonlyMap<string, JsonValue>, name: string): StructDescriptor {
    const keys = Array.from(obj.keys()).sort(compareKeys);
    const fields: FieldDescriptor[] = [];
    const typeNames = new Set<string>();
    for (const key of keys) {
      const value = obj.get(key);
      if (value === undefined) continue;
      fields.push({ sourceKey: key, identifier: formatFieldName(key), type: inferFieldType(value, key, typeNames) });
    }
    logDebug('inference', `Inferred struct ${name}`, { fields: fields.map(f => f.sourceKey) });
    return { name, fields };
  }

  return buildStructDescriptor(entries, structName);
}

/**
 * Spells a field type, e.g. `std::vector<Piyo>`.
 */
export function renderType(type: TypeDescriptor, syntax: TargetSyntax = CPP_SYNTAX): string {
  switch (type.kind) {
    case 'scalar': return syntax.scalarTypes[type.scalar];
    case 'struct': return type.struct.name;
    case 'array': return syntax.arrayOf(renderType(type.element, syntax));
    case 'unknown': return syntax.unknownType;
  }
}

/**
 * Renders a struct descriptor and its nested declarations.
 * Each nested declaration sits right above the field that uses it.
 */
export function generateStruct(
  descriptor: StructDescriptor,
  options?: { indent?: number; syntax?: TargetSyntax }
): string {
  const pad = ' '.repeat(options?.indent ?? 2);
  const syntax = options?.syntax ?? CPP_SYNTAX;

  function structToLines(struct: StructDescriptor, prefix: string): string[] {
    const inner = prefix + pad;
    const lines = [`${prefix}${syntax.structKeyword} ${struct.name} {`];
    for (const field of struct.fields) {
      const element = elementTypeOf(field.type);
      if (element.kind === 'struct') {
        if (lines.length > 1) lines.push('');
        lines.push(...structToLines(element.struct, inner));
      }
      lines.push(`${inner}${renderType(field.type, syntax)} ${field.identifier};`);
    }
    lines.push(`${prefix}};`);
    return lines;
  }

  return `${structToLines(descriptor, '').join('\n')}\n`;
}
