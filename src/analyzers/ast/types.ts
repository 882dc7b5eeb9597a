/**
 * Source Model Types
 *
 * Flat, immutable structural model extracted from one parsed source unit.
 * Detectors read these values only; nothing here is mutated after build.
 */

/**
 * 1-based inclusive line range
 */
export interface SourceRange {
  readonly startLine: number;
  readonly endLine: number;
}

export type FunctionKind = 'function' | 'method' | 'constructor' | 'getter' | 'setter' | 'arrow';

export interface Parameter {
  readonly name: string;
  readonly position: number;
  /** True for the implicit `this` of instance members and for explicit `this:` parameters */
  readonly isReceiver: boolean;
}

interface StatementBase {
  readonly line: number;
  readonly endLine: number;
  /** `&&`, `||` and `??` in the statement's own expressions */
  readonly logicalOperators: number;
  /** `?:` in the statement's own expressions */
  readonly conditionalExpressions: number;
  /** Statements of anonymous callbacks appearing in the statement's own expressions */
  readonly inline: ReadonlyArray<Statement>;
}

export type SimpleStatementKind =
  | 'Assign'
  | 'Call'
  | 'Expression'
  | 'Return'
  | 'Throw'
  | 'Break'
  | 'Continue'
  | 'Declaration'
  | 'Other';

export interface SimpleStatement extends StatementBase {
  readonly kind: SimpleStatementKind;
}

export interface IfStatement extends StatementBase {
  readonly kind: 'If';
  readonly then: ReadonlyArray<Statement>;
  readonly else: ReadonlyArray<Statement>;
}

export interface LoopStatement extends StatementBase {
  readonly kind: 'For' | 'While';
  readonly body: ReadonlyArray<Statement>;
}

export interface SwitchCase {
  readonly isDefault: boolean;
  readonly body: ReadonlyArray<Statement>;
}

export interface SwitchStatement extends StatementBase {
  readonly kind: 'Switch';
  readonly cases: ReadonlyArray<SwitchCase>;
}

export interface TryStatement extends StatementBase {
  readonly kind: 'Try';
  readonly block: ReadonlyArray<Statement>;
  readonly handler: ReadonlyArray<Statement> | null;
  readonly finalizer: ReadonlyArray<Statement> | null;
}

export interface BlockStatement extends StatementBase {
  readonly kind: 'Block';
  readonly body: ReadonlyArray<Statement>;
}

export type Statement =
  | SimpleStatement
  | IfStatement
  | LoopStatement
  | SwitchStatement
  | TryStatement
  | BlockStatement;

export type StatementKind = Statement['kind'];

export type TokenCategory =
  | 'identifier'
  | 'keyword'
  | 'punctuation'
  | 'number'
  | 'string'
  | 'template'
  | 'regex'
  | 'boolean'
  | 'jsx-text'
  | 'nested';

export type IdentifierRole = 'name' | 'member' | 'param' | 'type' | 'call';

export interface LexicalToken {
  readonly text: string;
  readonly category: TokenCategory;
  readonly role?: IdentifierRole;
}

export type AccessOrigin =
  | { readonly kind: 'self' }
  | { readonly kind: 'foreign'; readonly target: string };

export interface AttributeAccess {
  readonly origin: AccessOrigin;
  readonly attribute: string;
  readonly line: number;
  readonly functionId: number;
}

export interface FunctionDef extends SourceRange {
  readonly id: number;
  readonly name: string;
  /** `Class.member` for class members, plain name otherwise */
  readonly qualifiedName: string;
  readonly kind: FunctionKind;
  readonly parameters: ReadonlyArray<Parameter>;
  readonly body: ReadonlyArray<Statement>;
  readonly tokens: ReadonlyArray<LexicalToken>;
  readonly accesses: ReadonlyArray<AttributeAccess>;
  readonly ownerClassId?: number;
}

export interface ClassDef extends SourceRange {
  readonly id: number;
  readonly name: string;
  readonly fields: ReadonlyArray<string>;
  readonly methods: ReadonlyArray<FunctionDef>;
}

export interface LiteralOccurrence {
  readonly value: number;
  readonly line: number;
  readonly functionId?: number;
  /** Whole initializer of an UPPER_SNAKE_CASE binding or an enum member */
  readonly inConstantDefinition: boolean;
}

export interface SourceUnit {
  readonly filePath: string;
  readonly lineCount: number;
  readonly classes: ReadonlyArray<ClassDef>;
  /** Functions not owned by a class */
  readonly functions: ReadonlyArray<FunctionDef>;
  readonly literals: ReadonlyArray<LiteralOccurrence>;
}
