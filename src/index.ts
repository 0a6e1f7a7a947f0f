export { generate, type JsonToStructResult } from './jsonToStruct';
export {
  generateDescriptorFromJson,
  generateStruct,
  renderType,
  elementTypeOf,
  type FieldDescriptor,
  type StructDescriptor,
  type TypeDescriptor,
  type UnknownReason,
} from './structDescriptorGenerator';
export { formatFieldName, formatTypeName } from './fieldNameUtil';
export { decodeJson, toJsonValue, type JsonValue, type JsonKind } from './jsonValue';
export { CPP_SYNTAX, type ScalarKind, type TargetSyntax } from './cppSyntax';
export {
  GenerateOptionsSchema,
  resolveOptions,
  type GenerateOptions,
  type ResolvedGenerateOptions,
} from './config';
export {
  JsonToStructError,
  DecodeError,
  UnsupportedShapeError,
  OptionsError,
  type JsonToStructErrorCode,
} from './errors';
