export type ScalarKind = 'string' | 'float64' | 'int64' | 'boolean';

/**
 * Spelling of the rendered declarations for one target language.
 */
export interface TargetSyntax {
  readonly structKeyword: string;
  readonly scalarTypes: Readonly<Record<ScalarKind, string>>;
  /** Placeholder for values whose type cannot be inferred (null, mixed arrays) */
  readonly unknownType: string;
  readonly arrayOf: (elementType: string) => string;
}

export const CPP_SYNTAX: TargetSyntax = Object.freeze({
  structKeyword: 'struct',
  scalarTypes: Object.freeze({
    string: 'std::string',
    float64: 'float',
    int64: 'int64_t',
    boolean: 'bool',
  }),
  unknownType: 'std::any',
  arrayOf: (elementType: string) => `std::vector<${elementType}>`,
});
