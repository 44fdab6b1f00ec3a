import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { Var } from '../../src/vars/var';
import { NameAllocator } from '../../src/vars/names';
import { VarAttributeError, VarTypeError } from '../../src/common/errors';

describe('var creation (VARS)', () => {
  it('should render JSON literals when created from plain values', () => {
    expect(Var.create(1).toString()).toBe('1');
    expect(Var.create('hi').toString()).toBe('"hi"');
    expect(Var.create([1, 2, 3]).toString()).toBe('[1,2,3]');
    expect(Var.create({ a: true }).toString()).toBe('{"a":true}');
    expect(Var.create(null).toString()).toBe('null');
  });

  it('should pass an existing var through unchanged', () => {
    const v = Var.raw('count', z.number(), { state: 'app' });
    expect(Var.create(v)).toBe(v);
  });

  it('should keep string text raw when created with isString', () => {
    const v = Var.create('hello', { isString: true });
    expect(v.toString()).toBe('hello');
    expect(v.toJsx()).toBe('{`hello`}');
  });

  it('should throw VarTypeError when the value is not JSON encodable', () => {
    expect(() => Var.create(new Map())).toThrow(VarTypeError);
    expect(() => Var.create(new Map())).toThrow(
      'Unsupported type Map for Var.create: value is not JSON encodable'
    );
    expect(() => Var.create(() => 1)).toThrow(
      'Unsupported type function for Var.create: value is not JSON encodable'
    );
    expect(() => Var.create(Number.NaN)).toThrow(
      'Unsupported type number for Var.create: value is not JSON encodable'
    );
    expect(() => Var.create([1, Infinity])).toThrow(VarTypeError);
  });

  it('should prefix the owning state when the var is not local', () => {
    const v = Var.raw('count', z.number(), { state: 'app' });
    expect(v.isLocal).toBe(false);
    expect(v.toString()).toBe('app.count');
    expect(v.toJsx()).toBe('{app.count}');
  });
});

describe('var operators (VARS)', () => {
  it('should render binary arithmetic textually', () => {
    expect(Var.create(1).add(Var.create(2)).toString()).toBe('(1 + 2)');
    expect(Var.create('a').add('b').toString()).toBe('("a" + "b")');
    expect(Var.create(3).mul(4).toString()).toBe('(3 * 4)');
    expect(Var.create(1).sub(5, { flip: true }).toString()).toBe('(5 - 1)');
  });

  it('should wrap the right operand of division only when it holds an operator', () => {
    const sum = Var.raw('a + b', z.number());
    expect(Var.create(6).div(sum).toString()).toBe('(6 / (a + b))');
    expect(Var.create(6).div(2).toString()).toBe('(6 / 2)');
    expect(Var.create(6).floorDiv(2).toString()).toBe('Math.floor(6 / 2)');
    expect(Var.create(6).mod(Var.raw('x', z.number())).toString()).toBe(
      '(6 % x)'
    );
    expect(Var.create(6).pow(2).toString()).toBe('Math.pow(6, 2)');
  });

  it('should type comparisons as boolean and keep the left type for arithmetic', () => {
    const count = Var.raw('count', z.number(), { state: 'app' });
    const eq = count.eq(3);
    expect(eq.toString()).toBe('(app.count == 3)');
    expect(eq.type).toBeInstanceOf(z.ZodBoolean);
    expect(count.neq(3).toString()).toBe('(app.count != 3)');
    expect(count.add(1).type).toBeInstanceOf(z.ZodNumber);
  });

  it('should render logical operators and orderings as boolean vars', () => {
    expect(Var.create(true).and(false).toString()).toBe('(true && false)');
    expect(Var.create(true).or(false).toString()).toBe('(true || false)');
    expect(Var.create(1).lt(2).toString()).toBe('(1 < 2)');
    expect(Var.create(1).ge(2, { flip: true }).toString()).toBe('(2 >= 1)');
    expect(Var.create(1).le(2).type).toBeInstanceOf(z.ZodBoolean);
  });

  it('should render JSON serialization as a string var', () => {
    const user = Var.raw('user', z.object({ name: z.string() }));
    const json = user.toJsonString();
    expect(json.toString()).toBe('JSON.stringify(user)');
    expect(json.type).toBeInstanceOf(z.ZodString);
  });

  it('should only be local when both operands are local', () => {
    const count = Var.raw('count', z.number(), { state: 'app' });
    expect(Var.create(1).add(2).isLocal).toBe(true);
    expect(count.add(1).isLocal).toBe(false);
  });

  it('should render unary operators', () => {
    const n = Var.raw('n', z.number());
    expect(n.neg().toString()).toBe('-(n)');
    expect(n.abs().toString()).toBe('Math.abs(n)');
    expect(n.not().toString()).toBe('!n');
    expect(Var.create([1]).length().toString()).toBe('[1].length');
  });

  it('should reject length on non-sequence vars', () => {
    expect(() => Var.raw('n', z.number()).length()).toThrow(VarTypeError);
  });
});

describe('var indexing (VARS)', () => {
  it('should use bounds-safe access for sequence indices', () => {
    const list = Var.create([1, 2, 3]);
    expect(list.index(0).toString()).toBe('[1,2,3].at(0)');
    expect(list.index(-1).toString()).toBe('[1,2,3].at(-1)');
    expect(list.index(0).type).toBeInstanceOf(z.ZodNumber);
  });

  it('should render slices with default bounds', () => {
    const list = Var.create([1, 2, 3]);
    expect(list.index(Var.slice(1)).toString()).toBe(
      '[1,2,3].slice(1, undefined)'
    );
    expect(list.index(Var.slice(undefined, 2)).toString()).toBe(
      '[1,2,3].slice(0, 2)'
    );
  });

  it('should index sequences with numeric vars', () => {
    const items = Var.raw('items', z.array(z.string()), { state: 'app' });
    const i = Var.raw('i', z.number());
    expect(items.index(i).toString()).toBe('app.items.at(i)');
  });

  it('should use key access for mappings', () => {
    const scores = Var.raw('scores', z.record(z.number()));
    expect(scores.index('alice').toString()).toBe('scores["alice"]');
    expect(scores.index(2).toString()).toBe('scores[2]');
    expect(scores.index(Var.raw('who', z.string())).toString()).toBe(
      'scores[who]'
    );
  });

  it('should reject unsupported index types', () => {
    expect(() => Var.create([1, 2]).index('a')).toThrow(VarTypeError);
    expect(() => Var.create([1, 2]).index(1.5)).toThrow(
      "Var '[1,2]' must be indexed with an integer or a slice, got 1.5"
    );
    expect(() => Var.raw('flag', z.boolean()).index(0)).toThrow(
      "Var 'flag' of type boolean does not support indexing"
    );
  });

  it('should require an annotation when the type is unresolved', () => {
    expect(() => Var.raw('data').index(0)).toThrow(
      /because its type is unresolved\. Annotate the var/
    );
  });
});

describe('var attributes and relabeling (VARS)', () => {
  const user = Var.raw('user', z.object({ name: z.string() }), {
    state: 'app',
  });

  it('should derive a field var scoped to the parent', () => {
    const name = user.attr('name');
    expect(name.toString()).toBe('app.user.name');
    expect(name.type).toBeInstanceOf(z.ZodString);
  });

  it('should explain possible mis-annotation for unknown attributes', () => {
    expect(() => user.attr('age')).toThrow(VarAttributeError);
    expect(() => user.attr('age')).toThrow(/may have been annotated wrongly/);
  });

  it('should change only the type when relabeled', () => {
    const one = Var.create(1);
    const relabeled = one.to(z.string());
    expect(relabeled.toString()).toBe('1');
    expect(relabeled.type).toBeInstanceOf(z.ZodString);
    expect(relabeled.equals(one)).toBe(false);
    expect(relabeled.key()).not.toBe(one.key());
  });

  it('should compare by expression, type, owner and locality', () => {
    expect(Var.create(1).equals(Var.create(1))).toBe(true);
    expect(Var.create(1).key()).toBe(Var.create(1).key());
    expect(
      Var.raw('x', z.number(), { state: 'a' }).equals(
        Var.raw('x', z.number(), { state: 'b' })
      )
    ).toBe(false);
  });
});

describe('var foreach (VARS)', () => {
  it('should render a map with allocated names', () => {
    const items = Var.raw('items', z.array(z.number()), { state: 'app' });
    const names = new NameAllocator();
    const doubled = items.foreach((x) => x.mul(2), names);
    expect(doubled.toString()).toBe('app.items.map((x_0, i) => (x_0 * 2))');
    expect(items.foreach((x) => x, names).toString()).toBe(
      'app.items.map((x_1, i) => x_1)'
    );
  });
});
