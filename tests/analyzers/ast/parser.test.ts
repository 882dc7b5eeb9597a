/**
 * Tests for SourceModelBuilder
 */

import { describe, it, expect, beforeAll } from 'vitest';
import { SourceModelBuilder, allFunctions } from '../../../src/analyzers/ast/parser.js';
import type { AttributeAccess, FunctionDef } from '../../../src/analyzers/ast/types.js';
import { ParseError } from '../../../src/analyzers/errors.js';

const originOf = (access: AttributeAccess): string =>
  access.origin.kind === 'self' ? 'self' : access.origin.target;

const byName = (functions: FunctionDef[], name: string): FunctionDef => {
  const found = functions.find(f => f.name === name);
  if (!found) throw new Error(`function ${name} not found`);
  return found;
};

describe('SourceModelBuilder', () => {
  let builder: SourceModelBuilder;

  beforeAll(() => {
    builder = new SourceModelBuilder();
  });

  describe('structure', () => {
    const source = [
      'export function add(a: number, b: number): number {',
      '  return a + b;',
      '}',
      '',
      'class Cart {',
      '  items: string[] = [];',
      '  constructor(private readonly owner: string) {',
      '    this.total = 0;',
      '  }',
      '  total: number;',
      '  static create(): Cart {',
      '    return new Cart("x");',
      '  }',
      '  get size(): number {',
      '    return this.items.length;',
      '  }',
      '  handle = (event: string) => {',
      '    this.items.push(event);',
      '  };',
      '}',
    ].join('\n');

    it('should separate top-level functions from class members', () => {
      const unit = builder.build(source, 'cart.ts');

      expect(unit.filePath).toBe('cart.ts');
      expect(unit.lineCount).toBe(20);
      expect(unit.functions.map(f => f.name)).toEqual(['add']);
      expect(unit.classes).toHaveLength(1);
      expect(unit.classes[0].name).toBe('Cart');
      expect(unit.classes[0].startLine).toBe(5);
      expect(unit.classes[0].endLine).toBe(20);
      expect(unit.classes[0].methods.map(m => m.name)).toEqual(['constructor', 'create', 'size', 'handle']);
    });

    it('should collect fields from properties, parameter properties and constructor assignments', () => {
      const unit = builder.build(source, 'cart.ts');
      expect(unit.classes[0].fields).toEqual(['items', 'owner', 'total']);
    });

    it('should number functions in source order and link owners', () => {
      const unit = builder.build(source, 'cart.ts');
      const functions = allFunctions(unit);

      expect(functions.map(f => f.id)).toEqual([0, 1, 2, 3, 4]);
      expect(functions.map(f => f.qualifiedName)).toEqual([
        'add',
        'Cart.constructor',
        'Cart.create',
        'Cart.size',
        'Cart.handle',
      ]);
      expect(functions.map(f => f.kind)).toEqual(['function', 'constructor', 'method', 'getter', 'arrow']);
      expect(functions[0].ownerClassId).toBeUndefined();
      expect(functions[1].ownerClassId).toBe(0);
    });

    it('should add a receiver parameter to instance members only', () => {
      const functions = allFunctions(builder.build(source, 'cart.ts'));

      expect(byName(functions, 'add').parameters).toEqual([
        { name: 'a', position: 0, isReceiver: false },
        { name: 'b', position: 1, isReceiver: false },
      ]);
      expect(byName(functions, 'constructor').parameters).toEqual([
        { name: 'this', position: 0, isReceiver: true },
        { name: 'owner', position: 1, isReceiver: false },
      ]);
      expect(byName(functions, 'create').parameters).toEqual([]);
      expect(byName(functions, 'handle').parameters.map(p => p.name)).toEqual(['this', 'event']);
    });

    it('should record line ranges of functions', () => {
      const size = byName(allFunctions(builder.build(source, 'cart.ts')), 'size');
      expect(size.startLine).toBe(14);
      expect(size.endLine).toBe(16);
    });

    it('should flag an explicit this parameter as the receiver', () => {
      const unit = builder.build('function bound(this: Window, id: string) {\n  return id;\n}');
      expect(unit.functions[0].parameters).toEqual([
        { name: 'this', position: 0, isReceiver: true },
        { name: 'id', position: 1, isReceiver: false },
      ]);
    });

    it('should model an empty unit', () => {
      const unit = builder.build('', 'empty.ts');
      expect(unit.classes).toEqual([]);
      expect(unit.functions).toEqual([]);
      expect(unit.literals).toEqual([]);
    });

    it('should freeze the model', () => {
      const unit = builder.build(source, 'cart.ts');
      expect(Object.isFrozen(unit)).toBe(true);
      expect(Object.isFrozen(unit.classes[0])).toBe(true);
      expect(Object.isFrozen(unit.functions[0].body)).toBe(true);
    });
  });

  describe('statements', () => {
    const source = [
      'function check(items: number[]) {',
      '  let total = 0;',
      '  for (const item of items) {',
      '    if (item > 10 && item < 20) {',
      '      total += item;',
      '    } else {',
      '      continue;',
      '    }',
      '  }',
      '  items.forEach(x => { total += x ? 1 : 2; });',
      '  return total;',
      '}',
    ].join('\n');

    it('should build tagged statements', () => {
      const [check] = builder.build(source).functions;
      expect(check.body.map(s => s.kind)).toEqual(['Assign', 'For', 'Call', 'Return']);
    });

    it('should nest branches and count logical operators', () => {
      const [check] = builder.build(source).functions;
      const loop = check.body[1];
      if (loop.kind !== 'For') throw new Error('expected a loop');

      const branch = loop.body[0];
      if (branch.kind !== 'If') throw new Error('expected an if');

      expect(branch.logicalOperators).toBe(1);
      expect(branch.line).toBe(4);
      expect(branch.endLine).toBe(8);
      expect(branch.then.map(s => s.kind)).toEqual(['Assign']);
      expect(branch.else.map(s => s.kind)).toEqual(['Continue']);
    });

    it('should lift anonymous callbacks into the statement that contains them', () => {
      const [check] = builder.build(source).functions;
      const call = check.body[2];

      expect(call.inline.map(s => s.kind)).toEqual(['Assign']);
      expect(call.inline[0].conditionalExpressions).toBe(1);
      expect(call.conditionalExpressions).toBe(0);
    });

    it('should treat an expression-bodied arrow as a return', () => {
      const unit = builder.build('const double = (n: number) => n > 0 ? n * 2 : 0;');
      expect(unit.functions[0].body).toHaveLength(1);
      expect(unit.functions[0].body[0].kind).toBe('Return');
      expect(unit.functions[0].body[0].conditionalExpressions).toBe(1);
    });

    it('should model switch and try statements', () => {
      const unit = builder.build(
        [
          'function route(kind: string) {',
          '  switch (kind) {',
          '    case "a":',
          '      return 1;',
          '    default:',
          '      break;',
          '  }',
          '  try {',
          '    run();',
          '  } catch (e) {',
          '    throw e;',
          '  }',
          '}',
        ].join('\n')
      );
      const [switchStatement, tryStatement] = unit.functions[0].body;

      if (switchStatement.kind !== 'Switch') throw new Error('expected a switch');
      expect(switchStatement.cases.map(c => c.isDefault)).toEqual([false, true]);
      expect(switchStatement.cases[0].body.map(s => s.kind)).toEqual(['Return']);

      if (tryStatement.kind !== 'Try') throw new Error('expected a try');
      expect(tryStatement.block.map(s => s.kind)).toEqual(['Call']);
      expect(tryStatement.handler?.map(s => s.kind)).toEqual(['Throw']);
      expect(tryStatement.finalizer).toBeNull();
    });

    it('should model nested function definitions as opaque declarations', () => {
      const unit = builder.build(
        ['function outer() {', '  const inner = () => {', '    return 1;', '  };', '  return inner();', '}'].join('\n')
      );
      const outer = byName(allFunctions(unit), 'outer');

      expect(outer.body.map(s => s.kind)).toEqual(['Declaration', 'Return']);
      expect(allFunctions(unit).map(f => f.name)).toEqual(['outer', 'inner']);
    });
  });

  describe('tokens', () => {
    it('should tag identifiers by role and drop comments', () => {
      const unit = builder.build('function f(a: number) {\n  // note\n  return a + 1;\n}');
      const tokens = unit.functions[0].tokens;

      expect(tokens.map(t => t.text)).toEqual(['{', 'return', 'a', '+', '1', ';', '}']);
      expect(tokens.map(t => t.category)).toEqual([
        'punctuation',
        'keyword',
        'identifier',
        'punctuation',
        'number',
        'punctuation',
        'punctuation',
      ]);
      expect(tokens[2].role).toBe('name');
    });

    it('should distinguish member and call identifiers', () => {
      const unit = builder.build('function g() {\n  run();\n  return box.size;\n}');
      const roles = unit.functions[0].tokens.filter(t => t.category === 'identifier').map(t => [t.text, t.role]);

      expect(roles).toEqual([
        ['run', 'call'],
        ['box', 'name'],
        ['size', 'member'],
      ]);
    });
  });

  describe('literals', () => {
    it('should record numeric literals with sign, function and constant context', () => {
      const unit = builder.build(
        ['const MAX_RETRIES = 5;', 'enum Level { Low = 2 }', 'let limit = -7;', 'function f() { return 42; }'].join('\n')
      );

      expect(unit.literals).toEqual([
        { value: 5, line: 1, functionId: undefined, inConstantDefinition: true },
        { value: 2, line: 2, functionId: undefined, inConstantDefinition: true },
        { value: -7, line: 3, functionId: undefined, inConstantDefinition: false },
        { value: 42, line: 4, functionId: 0, inConstantDefinition: false },
      ]);
    });

    it('should not treat a constant used inside an expression as a definition', () => {
      const unit = builder.build('const TIMEOUT = 30 * 1000;');
      expect(unit.literals.map(l => [l.value, l.inConstantDefinition])).toEqual([
        [30, false],
        [1000, false],
      ]);
    });
  });

  describe('attribute accesses', () => {
    it('should classify access origins', () => {
      const unit = builder.build(
        [
          'class Report extends Base {',
          '  render(order: Order) {',
          '    const a = order.customer.address;',
          '    const b = this.load().total;',
          '    const c = new Formatter().format;',
          '    const d = [1, 2].length;',
          '    return super.render;',
          '  }',
          '}',
        ].join('\n')
      );
      const render = unit.classes[0].methods[0];

      expect(render.accesses.map(a => [originOf(a), a.attribute, a.line])).toEqual([
        ['order', 'address', 3],
        ['order', 'customer', 3],
        ['self', 'total', 4],
        ['self', 'load', 4],
        ['Formatter', 'format', 5],
        ['self', 'render', 7],
      ]);
      expect(render.accesses.every(a => a.functionId === render.id)).toBe(true);
    });

    it('should treat a receiver field used as a base as foreign', () => {
      const unit = builder.build('class Waiter {\n  recommend() {\n    return this.restaurant.menu.items;\n  }\n}');
      const accesses = unit.classes[0].methods[0].accesses;

      expect(accesses.map(a => [originOf(a), a.attribute])).toEqual([
        ['restaurant', 'items'],
        ['restaurant', 'menu'],
      ]);
    });

    it('should keep plain receiver fields and calls as self', () => {
      const unit = builder.build(
        [
          'class Waiter {',
          '  serve() {',
          '    this.count = this.orders[0].size + (this.tip!).amount;',
          '    return this.orders[0];',
          '  }',
          '}',
        ].join('\n')
      );
      const accesses = unit.classes[0].methods[0].accesses;

      expect(accesses.map(a => [originOf(a), a.attribute, a.line])).toEqual([
        ['self', 'count', 3],
        ['orders', 'size', 3],
        ['tip', 'amount', 3],
        ['self', 'orders', 4],
      ]);
    });

    it('should attribute accesses to the innermost function definition', () => {
      const unit = builder.build(
        ['function outer(a: A) {', '  const inner = (b: B) => b.value;', '  return a.value;', '}'].join('\n')
      );
      const [outer, inner] = allFunctions(unit);

      expect(outer.accesses.map(a => originOf(a))).toEqual(['a']);
      expect(inner.accesses.map(a => originOf(a))).toEqual(['b']);
    });
  });

  describe('errors', () => {
    it('should throw ParseError with the location of the first syntax error', () => {
      let caught: unknown;
      try {
        builder.build('const ok = 1;\nconst broken = ;\n', 'broken.ts');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ParseError);
      if (!(caught instanceof ParseError)) return;
      expect(caught.filePath).toBe('broken.ts');
      expect(caught.line).toBe(2);
      expect(caught.column).toBe(16);
      expect(caught.code).toBe('PARSE_ERROR');
      expect(caught.message).toContain('Expression expected');
    });

    it('should keep working after a parse error', () => {
      expect(() => builder.build('function (', 'bad.ts')).toThrow(ParseError);
      expect(builder.build('function ok() {}', 'ok.ts').functions).toHaveLength(1);
    });
  });
});
