/**
 * Source Model Builder
 *
 * Parses TypeScript/JavaScript text with ts-morph and extracts the flat
 * structural model the smell detectors work on.
 */

import { extname } from 'path';
import { Node, Project, ScriptTarget, SyntaxKind } from 'ts-morph';
import type {
  ArrowFunction,
  ClassDeclaration,
  ClassExpression,
  ConstructorDeclaration,
  FunctionDeclaration,
  FunctionExpression,
  GetAccessorDeclaration,
  MethodDeclaration,
  NumericLiteral,
  SetAccessorDeclaration,
  SourceFile,
  ts,
} from 'ts-morph';
import { ParseError } from '../errors.js';
import type {
  AccessOrigin,
  AttributeAccess,
  ClassDef,
  FunctionDef,
  FunctionKind,
  IdentifierRole,
  LexicalToken,
  LiteralOccurrence,
  Parameter,
  SimpleStatementKind,
  SourceUnit,
  Statement,
} from './types.js';

type FunctionLikeNode =
  | FunctionDeclaration
  | MethodDeclaration
  | ConstructorDeclaration
  | GetAccessorDeclaration
  | SetAccessorDeclaration
  | ArrowFunction
  | FunctionExpression;

type ClassLikeNode = ClassDeclaration | ClassExpression;

interface ExpressionFacts {
  readonly logicalOperators: number;
  readonly conditionalExpressions: number;
  readonly inline: ReadonlyArray<Statement>;
}

const SUPPORTED_EXTENSIONS = new Set(['.ts', '.tsx', '.js', '.jsx', '.mts', '.cts', '.mjs', '.cjs']);

const LOGICAL_OPERATORS = new Set<SyntaxKind>([
  SyntaxKind.AmpersandAmpersandToken,
  SyntaxKind.BarBarToken,
  SyntaxKind.QuestionQuestionToken,
  SyntaxKind.AmpersandAmpersandEqualsToken,
  SyntaxKind.BarBarEqualsToken,
  SyntaxKind.QuestionQuestionEqualsToken,
]);

const CONSTANT_NAME = /^[A-Z][A-Z0-9_]*$/;

const SELF: AccessOrigin = Object.freeze({ kind: 'self' });

const EMPTY_FACTS: ExpressionFacts = Object.freeze({ logicalOperators: 0, conditionalExpressions: 0, inline: Object.freeze([]) });

/**
 * Per-build scratch state; discarded once the unit is frozen
 */
interface BuildContext {
  readonly defIds: Map<ts.Node, number>;
}

export class SourceModelBuilder {
  private project: Project;

  constructor() {
    this.project = new Project({
      useInMemoryFileSystem: true,
      compilerOptions: {
        target: ScriptTarget.Latest,
        allowJs: true,
        noLib: true,
        noResolve: true,
        skipLibCheck: true,
      },
      skipAddingFilesFromTsConfig: true,
    });
  }

  /**
   * Parse source text into an immutable SourceUnit.
   * Throws ParseError at the first syntax error.
   */
  build(text: string, filePath: string = 'source.ts'): SourceUnit {
    const extension = extname(filePath).toLowerCase();
    const virtualPath = `/unit${SUPPORTED_EXTENSIONS.has(extension) ? extension : '.ts'}`;
    const sourceFile = this.project.createSourceFile(virtualPath, text, { overwrite: true });

    try {
      this.assertSyntax(sourceFile, filePath);
      return this.extractUnit(sourceFile, filePath);
    } finally {
      this.project.removeSourceFile(sourceFile);
    }
  }

  private assertSyntax(sourceFile: SourceFile, filePath: string): void {
    const [first] = this.project.getProgram().getSyntacticDiagnostics(sourceFile);
    if (!first) return;

    const { line, column } = sourceFile.getLineAndColumnAtPos(first.getStart() ?? 0);
    const messageText = first.getMessageText();
    const message = typeof messageText === 'string' ? messageText : messageText.getMessageText();
    throw new ParseError(message, filePath, line, column);
  }

  private extractUnit(sourceFile: SourceFile, filePath: string): SourceUnit {
    const functionNodes: FunctionLikeNode[] = [];
    const classNodes: ClassLikeNode[] = [];

    sourceFile.forEachDescendant((node) => {
      if (Node.isClassDeclaration(node) || Node.isClassExpression(node)) {
        classNodes.push(node);
      } else if (isFunctionDefNode(node)) {
        functionNodes.push(node);
      }
    });

    const ctx: BuildContext = { defIds: new Map(functionNodes.map((node, id) => [node.compilerNode, id])) };
    const classIds = new Map<ts.Node, number>(classNodes.map((node, id) => [node.compilerNode, id]));

    const literals: LiteralOccurrence[] = [];
    const accesses = new Map<number, AttributeAccess[]>(functionNodes.map((_, id) => [id, []]));
    this.collectReferences(sourceFile, ctx, literals, accesses);

    const functions = functionNodes.map((node, id) => {
      const owner = getOwnerClass(node);
      const ownerClassId = owner ? classIds.get(owner.compilerNode) : undefined;
      const ownerName = owner ? getClassName(owner) : undefined;
      return this.buildFunction(node, id, ctx, accesses.get(id) ?? [], ownerClassId, ownerName);
    });

    const classes = classNodes.map((node, id) =>
      Object.freeze<ClassDef>({
        id,
        name: getClassName(node),
        startLine: node.getStartLineNumber(),
        endLine: node.getEndLineNumber(),
        fields: Object.freeze(extractFields(node)),
        methods: Object.freeze(functions.filter(f => f.ownerClassId === id)),
      })
    );

    return Object.freeze({
      filePath,
      lineCount: sourceFile.getEndLineNumber(),
      classes: Object.freeze(classes),
      functions: Object.freeze(functions.filter(f => f.ownerClassId === undefined)),
      literals: Object.freeze(literals),
    });
  }

  /**
   * Single pre-order walk that records numeric literals for the unit and
   * attribute accesses for the innermost enclosing function.
   */
  private collectReferences(
    sourceFile: SourceFile,
    ctx: BuildContext,
    literals: LiteralOccurrence[],
    accesses: Map<number, AttributeAccess[]>
  ): void {
    const walk = (node: Node, enclosing: number | undefined): void => {
      const functionId = ctx.defIds.get(node.compilerNode) ?? enclosing;

      if (Node.isNumericLiteral(node)) {
        literals.push(toLiteralOccurrence(node, functionId));
      } else if (Node.isPropertyAccessExpression(node) && functionId !== undefined) {
        const origin = resolveOrigin(node.getExpression());
        // `this.f.x` is recorded once, as a foreign access to `f`
        if (origin && !(origin.kind === 'self' && isChainBase(node))) {
          accesses.get(functionId)?.push(
            Object.freeze({ origin, attribute: node.getName(), line: node.getStartLineNumber(), functionId })
          );
        }
      }

      node.forEachChild(child => walk(child, functionId));
    };

    sourceFile.forEachChild(child => walk(child, undefined));
  }

  private buildFunction(
    node: FunctionLikeNode,
    id: number,
    ctx: BuildContext,
    accesses: AttributeAccess[],
    ownerClassId: number | undefined,
    ownerName: string | undefined
  ): FunctionDef {
    const name = getFunctionName(node);
    const body = node.getBody();
    const tokens: LexicalToken[] = [];
    if (body) collectTokens(body, body, ctx, tokens);

    return Object.freeze<FunctionDef>({
      id,
      name,
      qualifiedName: ownerName ? `${ownerName}.${name}` : name,
      kind: getFunctionKind(node),
      startLine: node.getStartLineNumber(),
      endLine: node.getEndLineNumber(),
      parameters: Object.freeze(extractParameters(node, ownerClassId !== undefined && !isStaticMember(node))),
      body: Object.freeze(this.buildBody(node, ctx)),
      tokens: Object.freeze(tokens),
      accesses: Object.freeze(accesses),
      ownerClassId,
    });
  }

  private buildBody(node: FunctionLikeNode, ctx: BuildContext): Statement[] {
    const body = node.getBody();
    if (!body) return [];
    if (Node.isBlock(body)) return this.buildStatements(body.getStatements(), ctx);

    // Expression-bodied arrow: treat as an implicit return
    return [
      Object.freeze<Statement>({
        kind: 'Return',
        line: body.getStartLineNumber(),
        endLine: body.getEndLineNumber(),
        ...this.scanExpressions([body], ctx),
      }),
    ];
  }

  private buildStatements(nodes: readonly Node[], ctx: BuildContext): Statement[] {
    return nodes.map(node => this.buildStatement(node, ctx));
  }

  private branch(node: Node, ctx: BuildContext): Statement[] {
    return Node.isBlock(node) ? this.buildStatements(node.getStatements(), ctx) : [this.buildStatement(node, ctx)];
  }

  private buildStatement(node: Node, ctx: BuildContext): Statement {
    const line = node.getStartLineNumber();
    const endLine = node.getEndLineNumber();
    const simple = (kind: SimpleStatementKind, facts: ExpressionFacts = EMPTY_FACTS): Statement =>
      Object.freeze({ kind, line, endLine, ...facts });

    if (Node.isIfStatement(node)) {
      const elseStatement = node.getElseStatement();
      return Object.freeze({
        kind: 'If',
        line,
        endLine,
        ...this.scanExpressions([node.getExpression()], ctx),
        then: Object.freeze(this.branch(node.getThenStatement(), ctx)),
        else: Object.freeze(elseStatement ? this.branch(elseStatement, ctx) : []),
      });
    }

    if (Node.isForStatement(node)) {
      return Object.freeze({
        kind: 'For',
        line,
        endLine,
        ...this.scanExpressions([node.getInitializer(), node.getCondition(), node.getIncrementor()], ctx),
        body: Object.freeze(this.branch(node.getStatement(), ctx)),
      });
    }

    if (Node.isForInStatement(node) || Node.isForOfStatement(node)) {
      return Object.freeze({
        kind: 'For',
        line,
        endLine,
        ...this.scanExpressions([node.getInitializer(), node.getExpression()], ctx),
        body: Object.freeze(this.branch(node.getStatement(), ctx)),
      });
    }

    if (Node.isWhileStatement(node) || Node.isDoStatement(node)) {
      return Object.freeze({
        kind: 'While',
        line,
        endLine,
        ...this.scanExpressions([node.getExpression()], ctx),
        body: Object.freeze(this.branch(node.getStatement(), ctx)),
      });
    }

    if (Node.isSwitchStatement(node)) {
      const clauses = node.getClauses();
      return Object.freeze({
        kind: 'Switch',
        line,
        endLine,
        ...this.scanExpressions(
          [node.getExpression(), ...clauses.map(clause => (Node.isCaseClause(clause) ? clause.getExpression() : undefined))],
          ctx
        ),
        cases: Object.freeze(
          clauses.map(clause =>
            Object.freeze({
              isDefault: Node.isDefaultClause(clause),
              body: Object.freeze(this.buildStatements(clause.getStatements(), ctx)),
            })
          )
        ),
      });
    }

    if (Node.isTryStatement(node)) {
      const handler = node.getCatchClause();
      const finalizer = node.getFinallyBlock();
      return Object.freeze({
        kind: 'Try',
        line,
        endLine,
        ...EMPTY_FACTS,
        block: Object.freeze(this.buildStatements(node.getTryBlock().getStatements(), ctx)),
        handler: handler ? Object.freeze(this.buildStatements(handler.getBlock().getStatements(), ctx)) : null,
        finalizer: finalizer ? Object.freeze(this.buildStatements(finalizer.getStatements(), ctx)) : null,
      });
    }

    if (Node.isBlock(node)) {
      return Object.freeze({
        kind: 'Block',
        line,
        endLine,
        ...EMPTY_FACTS,
        body: Object.freeze(this.buildStatements(node.getStatements(), ctx)),
      });
    }

    if (Node.isLabeledStatement(node)) {
      return this.buildStatement(node.getStatement(), ctx);
    }

    if (Node.isVariableStatement(node)) {
      const declarations = node.getDeclarations();
      const onlyDefinitions = declarations.every(declaration => {
        const initializer = declaration.getInitializer();
        return initializer !== undefined && (ctx.defIds.has(initializer.compilerNode) || Node.isClassExpression(initializer));
      });
      return onlyDefinitions ? simple('Declaration') : simple('Assign', this.scanExpressions([node.getDeclarationList()], ctx));
    }

    if (Node.isExpressionStatement(node)) {
      const expression = node.getExpression();
      return simple(classifyExpressionStatement(expression), this.scanExpressions([expression], ctx));
    }

    if (Node.isReturnStatement(node)) return simple('Return', this.scanExpressions([node.getExpression()], ctx));
    if (Node.isThrowStatement(node)) return simple('Throw', this.scanExpressions([node.getExpression()], ctx));
    if (Node.isBreakStatement(node)) return simple('Break');
    if (Node.isContinueStatement(node)) return simple('Continue');

    if (
      Node.isFunctionDeclaration(node) ||
      Node.isClassDeclaration(node) ||
      Node.isInterfaceDeclaration(node) ||
      Node.isTypeAliasDeclaration(node) ||
      Node.isEnumDeclaration(node)
    ) {
      return simple('Declaration');
    }

    return simple('Other');
  }

  /**
   * Count decision-relevant operators in a statement's own expressions and lift
   * anonymous callback bodies into `inline`. Stops at nested function
   * definitions and classes, which are modelled on their own.
   */
  private scanExpressions(nodes: ReadonlyArray<Node | undefined>, ctx: BuildContext): ExpressionFacts {
    let logicalOperators = 0;
    let conditionalExpressions = 0;
    const inline: Statement[] = [];

    const visit = (node: Node): void => {
      if (ctx.defIds.has(node.compilerNode) || Node.isClassDeclaration(node) || Node.isClassExpression(node)) {
        return;
      }
      if (Node.isArrowFunction(node) || Node.isFunctionExpression(node)) {
        inline.push(...this.buildBody(node, ctx));
        return;
      }
      if (Node.isBinaryExpression(node) && LOGICAL_OPERATORS.has(node.getOperatorToken().getKind())) {
        logicalOperators++;
      } else if (Node.isConditionalExpression(node)) {
        conditionalExpressions++;
      }
      node.forEachChild(visit);
    };

    for (const node of nodes) {
      if (node) visit(node);
    }
    return { logicalOperators, conditionalExpressions, inline: Object.freeze(inline) };
  }
}

/**
 * A node is modelled as its own FunctionDef when it is a declaration with a body,
 * a class or object member with a body, or a function expression bound to a name.
 */
function isFunctionDefNode(node: Node): node is FunctionLikeNode {
  if (
    Node.isFunctionDeclaration(node) ||
    Node.isMethodDeclaration(node) ||
    Node.isConstructorDeclaration(node) ||
    Node.isGetAccessorDeclaration(node) ||
    Node.isSetAccessorDeclaration(node)
  ) {
    return node.getBody() !== undefined;
  }
  if (Node.isArrowFunction(node) || Node.isFunctionExpression(node)) {
    const parent = node.getParent();
    return (
      parent !== undefined &&
      (Node.isVariableDeclaration(parent) || Node.isPropertyDeclaration(parent) || Node.isPropertyAssignment(parent))
    );
  }
  return false;
}

function getFunctionName(node: FunctionLikeNode): string {
  if (Node.isConstructorDeclaration(node)) return 'constructor';
  if (Node.isArrowFunction(node) || Node.isFunctionExpression(node)) {
    const parent = node.getParent();
    if (Node.isVariableDeclaration(parent) || Node.isPropertyDeclaration(parent) || Node.isPropertyAssignment(parent)) {
      return parent.getName();
    }
    return '<anonymous>';
  }
  return node.getName() ?? '<anonymous>';
}

function getFunctionKind(node: FunctionLikeNode): FunctionKind {
  if (Node.isFunctionDeclaration(node) || Node.isFunctionExpression(node)) return 'function';
  if (Node.isMethodDeclaration(node)) return 'method';
  if (Node.isConstructorDeclaration(node)) return 'constructor';
  if (Node.isGetAccessorDeclaration(node)) return 'getter';
  if (Node.isSetAccessorDeclaration(node)) return 'setter';
  return 'arrow';
}

function getOwnerClass(node: FunctionLikeNode): ClassLikeNode | undefined {
  let parent: Node | undefined = node.getParent();
  if ((Node.isArrowFunction(node) || Node.isFunctionExpression(node)) && parent && Node.isPropertyDeclaration(parent)) {
    parent = parent.getParent();
  }
  if (parent && (Node.isClassDeclaration(parent) || Node.isClassExpression(parent))) return parent;
  return undefined;
}

function isStaticMember(node: FunctionLikeNode): boolean {
  if (Node.isMethodDeclaration(node) || Node.isGetAccessorDeclaration(node) || Node.isSetAccessorDeclaration(node)) {
    return node.isStatic();
  }
  const parent = node.getParent();
  return parent !== undefined && Node.isPropertyDeclaration(parent) && parent.isStatic();
}

function getClassName(node: ClassLikeNode): string {
  const name = node.getName();
  if (name) return name;
  const parent = node.getParent();
  return parent && Node.isVariableDeclaration(parent) ? parent.getName() : '<anonymous>';
}

function extractParameters(node: FunctionLikeNode, hasImplicitReceiver: boolean): Parameter[] {
  const declared = node.getParameters().map(param => param.getName());
  const explicitThis = declared[0] === 'this';
  const names = hasImplicitReceiver && !explicitThis ? ['this', ...declared] : declared;

  return names.map((name, position) =>
    Object.freeze({
      name,
      position,
      isReceiver: position === 0 && name === 'this' && (hasImplicitReceiver || explicitThis),
    })
  );
}

/**
 * Property declarations that are not function-valued, constructor parameter
 * properties and `this.x = ...` targets inside the constructor.
 */
function extractFields(node: ClassLikeNode): string[] {
  const fields = new Set<string>();

  for (const member of node.getMembers()) {
    if (Node.isPropertyDeclaration(member)) {
      const initializer = member.getInitializer();
      if (!initializer || !(Node.isArrowFunction(initializer) || Node.isFunctionExpression(initializer))) {
        fields.add(member.getName());
      }
    } else if (Node.isConstructorDeclaration(member) && member.getBody()) {
      for (const param of member.getParameters()) {
        if (param.isParameterProperty()) fields.add(param.getName());
      }
      for (const assignment of member.getDescendantsOfKind(SyntaxKind.BinaryExpression)) {
        const left = assignment.getLeft();
        if (
          assignment.getOperatorToken().getKind() === SyntaxKind.EqualsToken &&
          Node.isPropertyAccessExpression(left) &&
          Node.isThisExpression(left.getExpression())
        ) {
          fields.add(left.getName());
        }
      }
    }
  }

  return [...fields];
}

function toLiteralOccurrence(node: NumericLiteral, functionId: number | undefined): LiteralOccurrence {
  const parent = node.getParent();
  const negated =
    parent !== undefined &&
    Node.isPrefixUnaryExpression(parent) &&
    parent.getOperatorToken() === SyntaxKind.MinusToken;
  const whole: Node = negated && parent ? parent : node;
  const holder = whole.getParent();

  let inConstantDefinition = false;
  if (holder && Node.isEnumMember(holder)) {
    inConstantDefinition = true;
  } else if (holder && (Node.isVariableDeclaration(holder) || Node.isPropertyDeclaration(holder))) {
    inConstantDefinition =
      holder.getInitializer()?.compilerNode === whole.compilerNode && CONSTANT_NAME.test(holder.getName());
  }

  return Object.freeze({
    value: negated ? -node.getLiteralValue() : node.getLiteralValue(),
    line: whole.getStartLineNumber(),
    functionId,
    inConstantDefinition,
  });
}

function isReceiverExpression(node: Node): boolean {
  return Node.isThisExpression(node) || Node.isSuperExpression(node);
}

function unwrap(node: Node): Node {
  let current = node;
  while (
    Node.isParenthesizedExpression(current) ||
    Node.isNonNullExpression(current) ||
    Node.isAsExpression(current) ||
    Node.isSatisfiesExpression(current) ||
    Node.isTypeAssertion(current) ||
    Node.isAwaitExpression(current)
  ) {
    current = current.getExpression();
  }
  return current;
}

/**
 * Wrapper or element access whose base is `node`, if any
 */
function wrappedBase(parent: Node): Node | undefined {
  if (
    Node.isParenthesizedExpression(parent) ||
    Node.isNonNullExpression(parent) ||
    Node.isAsExpression(parent) ||
    Node.isSatisfiesExpression(parent) ||
    Node.isTypeAssertion(parent) ||
    Node.isAwaitExpression(parent) ||
    Node.isElementAccessExpression(parent)
  ) {
    return parent.getExpression();
  }
  return undefined;
}

/**
 * True when the access is the base of a further property access
 */
function isChainBase(access: Node): boolean {
  let current = access;
  let parent = current.getParent();
  while (parent && wrappedBase(parent)?.compilerNode === current.compilerNode) {
    current = parent;
    parent = current.getParent();
  }
  return (
    parent !== undefined &&
    Node.isPropertyAccessExpression(parent) &&
    parent.getExpression().compilerNode === current.compilerNode
  );
}

/**
 * Classify the base of a property access as the receiver itself or as a
 * foreign object identified by its apparent root name.
 */
function resolveOrigin(base: Node): AccessOrigin | undefined {
  const node = unwrap(base);

  if (isReceiverExpression(node)) return SELF;
  if (Node.isIdentifier(node)) return Object.freeze({ kind: 'foreign', target: node.getText() });

  if (Node.isPropertyAccessExpression(node)) {
    const inner = unwrap(node.getExpression());
    if (isReceiverExpression(inner)) return Object.freeze({ kind: 'foreign', target: node.getName() });
    return resolveOrigin(inner);
  }

  if (Node.isElementAccessExpression(node)) return resolveOrigin(node.getExpression());

  if (Node.isCallExpression(node)) {
    const callee = unwrap(node.getExpression());
    if (Node.isPropertyAccessExpression(callee) && isReceiverExpression(unwrap(callee.getExpression()))) {
      return SELF;
    }
    return resolveOrigin(callee);
  }

  if (Node.isNewExpression(node)) return resolveOrigin(node.getExpression());

  return undefined;
}

function classifyExpressionStatement(expression: Node): SimpleStatementKind {
  let node = unwrap(expression);
  if (Node.isVoidExpression(node)) node = unwrap(node.getExpression());

  if (Node.isCallExpression(node) || Node.isNewExpression(node)) return 'Call';
  if (Node.isBinaryExpression(node)) {
    const operator = node.getOperatorToken().getKind();
    if (operator >= SyntaxKind.FirstAssignment && operator <= SyntaxKind.LastAssignment) return 'Assign';
  }
  if (Node.isPrefixUnaryExpression(node) || Node.isPostfixUnaryExpression(node)) {
    const operator = node.getOperatorToken();
    if (operator === SyntaxKind.PlusPlusToken || operator === SyntaxKind.MinusMinusToken) return 'Assign';
  }
  return 'Expression';
}

/**
 * Flatten a function body into its lexical tokens. Comments and whitespace are
 * trivia and never appear; nested definitions collapse to one `nested` token.
 */
function collectTokens(node: Node, root: Node, ctx: BuildContext, out: LexicalToken[]): void {
  if (
    node !== root &&
    (ctx.defIds.has(node.compilerNode) || Node.isClassDeclaration(node) || Node.isClassExpression(node))
  ) {
    out.push(Object.freeze({ text: '$nested', category: 'nested' }));
    return;
  }
  if (Node.isJSDoc(node)) return;

  const children = node.getChildren();
  if (children.length === 0) {
    const token = classifyToken(node);
    if (token) out.push(token);
    return;
  }
  for (const child of children) collectTokens(child, root, ctx, out);
}

function classifyToken(node: Node): LexicalToken | undefined {
  const kind = node.getKind();
  const text = node.getText();

  switch (kind) {
    case SyntaxKind.Identifier:
    case SyntaxKind.PrivateIdentifier:
      return Object.freeze({ text, category: 'identifier', role: identifierRole(node) });
    case SyntaxKind.NumericLiteral:
    case SyntaxKind.BigIntLiteral:
      return Object.freeze({ text, category: 'number' });
    case SyntaxKind.StringLiteral:
      return Object.freeze({ text, category: 'string' });
    case SyntaxKind.NoSubstitutionTemplateLiteral:
    case SyntaxKind.TemplateHead:
    case SyntaxKind.TemplateMiddle:
    case SyntaxKind.TemplateTail:
      return Object.freeze({ text, category: 'template' });
    case SyntaxKind.RegularExpressionLiteral:
      return Object.freeze({ text, category: 'regex' });
    case SyntaxKind.TrueKeyword:
    case SyntaxKind.FalseKeyword:
      return Object.freeze({ text, category: 'boolean' });
    case SyntaxKind.JsxText:
    case SyntaxKind.JsxTextAllWhiteSpaces:
      return text.trim() === '' ? undefined : Object.freeze({ text, category: 'jsx-text' });
    case SyntaxKind.EndOfFileToken:
      return undefined;
    default:
      if (kind >= SyntaxKind.FirstKeyword && kind <= SyntaxKind.LastKeyword) {
        return Object.freeze({ text, category: 'keyword' });
      }
      return Object.freeze({ text, category: 'punctuation' });
  }
}

function identifierRole(node: Node): IdentifierRole {
  const parent = node.getParent();
  if (!parent) return 'name';

  if (Node.isPropertyAccessExpression(parent) && parent.getNameNode().compilerNode === node.compilerNode) {
    return 'member';
  }
  if (Node.isParameterDeclaration(parent)) return 'param';
  if (Node.isTypeReference(parent) || Node.isExpressionWithTypeArguments(parent) || Node.isQualifiedName(parent)) {
    return 'type';
  }
  if (Node.isCallExpression(parent) && parent.getExpression().compilerNode === node.compilerNode) return 'call';
  return 'name';
}

/**
 * Every FunctionDef of the unit (top-level and methods) in source order
 */
export function allFunctions(unit: SourceUnit): FunctionDef[] {
  return [...unit.functions, ...unit.classes.flatMap(cls => cls.methods)].sort((a, b) => a.id - b.id);
}

let sharedBuilder: SourceModelBuilder | null = null;

/**
 * Lazily created builder shared by the analyzer and detectors
 */
export function getSourceModelBuilder(): SourceModelBuilder {
  sharedBuilder ??= new SourceModelBuilder();
  return sharedBuilder;
}

export function resetSourceModelBuilder(): void {
  sharedBuilder = null;
}
