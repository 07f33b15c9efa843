import {describe, expect, test} from 'vitest';
import {createResult, MemberRegistry, ValueFormatter, type ResultNode} from '../src/index.ts';

function depthOf(node: ResultNode): number {
	return node.children.reduce((max, child) => Math.max(max, depthOf(child) + 1), 0);
}

function pairs(node: ResultNode): Array<[string | undefined, string]> {
	return node.children.map((child): [string | undefined, string] => [child.label, child.value]);
}

describe('scalars and absent values', () => {
	test('null becomes a labelled <null> leaf', () => {
		expect(createResult(null, 'x')).toEqual({label: 'x', value: '<null>', children: []});
	});

	test('undefined becomes <undefined>', () => {
		expect(createResult(undefined)).toEqual({value: '<undefined>', children: []});
	});

	test('numbers are leaves', () => {
		expect(createResult(42, 'x')).toEqual({label: 'x', value: '42', children: []});
	});

	test('text is a leaf and is never iterated', () => {
		expect(createResult('hello', 'greeting')).toEqual({
			label: 'greeting',
			value: 'hello',
			children: [],
		});
	});

	test('functions, dates and regular expressions are scalar members', () => {
		const node = createResult({
			when: new Date(0),
			fn: function named() {},
			pattern: /ab+c/g,
			Shape: class Shape {},
		});

		expect(pairs(node)).toEqual([
			['when', '1970-01-01T00:00:00.000Z'],
			['fn', '[Function: named]'],
			['pattern', '/ab+c/g'],
			['Shape', '[class Shape]'],
		]);
	});

	test('absent members render the same text as absent roots', () => {
		expect(pairs(createResult({a: null, b: undefined}))).toEqual([
			['a', '<null>'],
			['b', '<undefined>'],
		]);
	});
});

describe('composite values', () => {
	test('members become children in declaration order', () => {
		const node = createResult({A: 1, B: 'hi'}, 'obj');

		expect(node).toEqual({
			label: 'obj',
			value: 'Object',
			children: [
				{label: 'A', value: '1', children: []},
				{label: 'B', value: 'hi', children: []},
			],
		});
	});

	test('class getters are read after own fields', () => {
		class Temperature {
			celsius = 20;
			get fahrenheit(): number {
				return this.celsius * 1.8 + 32;
			}
		}

		const node = createResult(new Temperature());

		expect(node.value).toBe('Temperature');
		expect(pairs(node)).toEqual([
			['celsius', '20'],
			['fahrenheit', '68'],
		]);
	});

	test('a composite member gets exactly one child holding its expansion', () => {
		const node = createResult({inner: {v: 1}});
		const inner = node.children[0];

		expect(inner.label).toBe('inner');
		expect(inner.value).toBe('Object');
		expect(inner.children).toEqual([
			{value: 'Object', children: [{label: 'v', value: '1', children: []}]},
		]);
	});

	test('own toString overrides are used for the value text', () => {
		class Version {
			constructor(
				public major: number,
				public minor: number,
			) {}

			toString(): string {
				return `v${this.major}.${this.minor}`;
			}
		}

		const node = createResult(new Version(1, 4), 'release');
		expect(node.label).toBe('release');
		expect(node.value).toBe('v1.4');
		expect(pairs(node)).toEqual([
			['major', '1'],
			['minor', '4'],
		]);
	});

	test('null-prototype objects are described as Object', () => {
		const bare = Object.create(null);
		bare.key = 'value';

		const node = createResult(bare);
		expect(node.value).toBe('Object');
		expect(pairs(node)).toEqual([['key', 'value']]);
	});
});

describe('member read failures', () => {
	test('a throwing getter yields a Threw node with the error subtree', () => {
		class Account {
			id = 7;
			get balance(): number {
				throw new RangeError('locked');
			}
		}

		const node = createResult(new Account());
		const balance = node.children[1];

		expect(balance.label).toBe('balance');
		expect(balance.value).toBe('Threw RangeError');
		expect(balance.children).toHaveLength(1);

		const error = balance.children[0];
		expect(error.label).toBe('RangeError');
		expect(error.value).toBe('locked');
		expect(pairs(error)).toEqual([
			['name', 'RangeError'],
			['message', 'locked'],
			['stack', ''],
		]);
	});

	test('thrown non-errors are named by their type', () => {
		const source = {
			get broken(): string {
				throw 'plain';
			},
		};

		const broken = createResult(source).children[0];
		expect(broken.value).toBe('Threw String');
		expect(broken.children).toEqual([{value: 'plain', children: []}]);
	});

	test('siblings of a failing member are still built', () => {
		const source = {
			get first(): number {
				throw new Error('nope');
			},
			second: 2,
		};

		expect(createResult(source).children[1]).toEqual({label: 'second', value: '2', children: []});
	});
});

describe('errors', () => {
	test('root errors are labelled by their type name', () => {
		const node = createResult(new TypeError('bad input'), 'ignored');

		expect(node.label).toBe('TypeError');
		expect(node.value).toBe('bad input');
	});

	test('error codes are part of the type name and listed as members', () => {
		const error = Object.assign(new Error('nope'), {code: 'E_TEST'});
		const node = createResult(error);

		expect(node.label).toBe('Error [E_TEST]');
		expect(pairs(node)).toEqual([
			['name', 'Error'],
			['message', 'nope'],
			['stack', ''],
			['code', 'E_TEST'],
		]);
	});

	test('cause is expanded as a member', () => {
		const error = new Error('outer', {cause: new Error('inner')});
		const cause = createResult(error).children[3];

		expect(cause.label).toBe('cause');
		expect(cause.value).toBe('Error: inner');
		expect(cause.children[0].label).toBe('Error');
		expect(cause.children[0].value).toBe('inner');
	});
});

describe('limits', () => {
	test('the tree never goes deeper than five hops', () => {
		const chain = {a: {a: {a: {a: {a: {a: {a: 1}}}}}}};
		const node = createResult(chain);

		expect(depthOf(node)).toBeLessThanOrEqual(5);

		const deepest = node.children[0].children[0].children[0].children[0];
		expect(deepest).toEqual({value: 'Object', children: []});
	});

	test('self references terminate at the depth bound', () => {
		const loop: Record<string, unknown> = {name: 'loop'};
		loop.self = loop;

		expect(depthOf(createResult(loop))).toBeLessThanOrEqual(5);
	});

	test('nested sequences stop at the depth bound', () => {
		const node = createResult([[[[[[[1]]]]]]]);

		expect(depthOf(node)).toBe(4);
		expect(node.children[0].children[0].children[0].children[0]).toEqual({
			value: 'Array(1)',
			children: [],
		});
	});

	test('member text is cut to 10000 characters', () => {
		const node = createResult({long: 'x'.repeat(10005)});
		expect(node.children[0].value).toHaveLength(10000);
	});

	test('root text is cut to the same length', () => {
		expect(createResult('y'.repeat(12000)).value).toHaveLength(10000);
	});

	test('limits can be lowered', () => {
		const node = createResult({word: 'abcdef'}, undefined, {limits: {maxStringLength: 3}});
		expect(node.children[0].value).toBe('abc');
	});

	test('invalid limits are rejected', () => {
		expect(() => new ValueFormatter({limits: {maxDepth: 0}})).toThrow();
		expect(() => new ValueFormatter({limits: {maxEnumerableLength: 1.5}})).toThrow();
	});

	test('an error at the depth bound keeps its type name and message', () => {
		const node = createResult([[[[new RangeError('deep')]]]]);

		expect(node.children[0].children[0].children[0].children[0]).toEqual({
			label: 'RangeError',
			value: 'deep',
			children: [],
		});
	});

	test('text at the depth bound is cut like any other text', () => {
		class Verbose {
			toString(): string {
				return 'z'.repeat(12000);
			}
		}

		const bounded = createResult([[[[new Verbose()]]]]).children[0].children[0].children[0].children[0];
		expect(bounded.value).toHaveLength(10000);
		expect(bounded.children).toEqual([]);

		const error = createResult([[[[new Error('m'.repeat(12000))]]]]).children[0].children[0].children[0]
			.children[0];
		expect(error.label).toBe('Error');
		expect(error.value).toHaveLength(10000);
	});

	test('a lower depth limit turns members into leaves sooner', () => {
		const node = createResult({inner: {v: 1}}, undefined, {limits: {maxDepth: 2}});
		expect(node.children).toEqual([{label: 'inner', value: 'Object', children: []}]);
	});
});

describe('member registry', () => {
	class Point {
		constructor(
			public x: number,
			public y: number,
		) {}
	}

	class Money {
		constructor(private cents: number) {}

		toString(): string {
			return `$${(this.cents / 100).toFixed(2)}`;
		}
	}

	test('registered tables replace member discovery', () => {
		const registry = new MemberRegistry().registerNames(Point, ['x']);
		const node = createResult(new Point(3, 4), 'p', {members: registry});

		expect(pairs(node)).toEqual([['x', '3']]);
	});

	test('tables apply to subclasses', () => {
		class Point3 extends Point {
			z = 5;
		}

		const registry = new MemberRegistry().register(Point, owner => [
			{name: 'sum', read: () => Reflect.get(owner, 'x') + Reflect.get(owner, 'y')},
		]);

		expect(pairs(createResult(new Point3(1, 2), undefined, {members: registry}))).toEqual([
			['sum', '3'],
		]);
	});

	test('registered scalars are leaves', () => {
		const registry = new MemberRegistry().registerScalar(Money);

		expect(createResult(new Money(1250), 'price', {members: registry})).toEqual({
			label: 'price',
			value: '$12.50',
			children: [],
		});
		expect(pairs(createResult({total: new Money(5)}, undefined, {members: registry}))).toEqual([
			['total', '$0.05'],
		]);
	});
});

describe('formatter registries', () => {
	class Money {
		constructor(private cents: number) {}

		toString(): string {
			return `$${(this.cents / 100).toFixed(2)}`;
		}
	}

	test('each formatter starts with its own empty registry', () => {
		const formatter = new ValueFormatter();
		formatter.registry.registerScalar(Money);

		expect(createResult(new Money(1250), 'price', formatter).children).toEqual([]);
		expect(new ValueFormatter().registry).not.toBe(formatter.registry);
		expect(pairs(createResult(new Money(1250), 'price'))).toEqual([['cents', '1250']]);
	});
});

describe('determinism', () => {
	test('two builds of an unchanged value are identical', () => {
		const value = {name: 'set', items: [1, 'two', {three: 3}], nested: {deep: {deeper: true}}};
		expect(createResult(value, 'v')).toEqual(createResult(value, 'v'));
	});

	test('nodes are frozen', () => {
		const node = createResult({a: 1});
		expect(Object.isFrozen(node)).toBe(true);
		expect(Object.isFrozen(node.children)).toBe(true);
	});
});
