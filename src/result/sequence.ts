import {formatValue, kindOf, truncate} from './classify.ts';
import type {ValueFormatter} from './formatter.ts';
import {createNode, type ResultNode} from './node.ts';

/**
 * A sequence whose elements share one key
 */
export class Grouping<K, T> implements Iterable<T> {
	constructor(
		public readonly key: K,
		private readonly items: readonly T[],
	) {}

	[Symbol.iterator](): Iterator<T> {
		return this.items[Symbol.iterator]();
	}
}

/**
 * Groups items by key, keeping groups in first-seen key order
 */
export function groupBy<K, T>(items: Iterable<T>, keyOf: (item: T) => K): Grouping<K, T>[] {
	const groups = new Map<K, T[]>();

	for (const item of items) {
		const key = keyOf(item);
		const group = groups.get(key);
		if (group) {
			group.push(item);
		} else {
			groups.set(key, [item]);
		}
	}

	return Array.from(groups, ([key, group]) => new Grouping(key, group));
}

/**
 * Expands an iterable into a summary node with one child per element, up to the enumerable cap
 * @param depth Depth of the element nodes
 */
export function buildSequence(
	formatter: ValueFormatter,
	sequence: Iterable<unknown> & object,
	label: string | undefined,
	depth: number,
): ResultNode {
	const {maxEnumerableLength, maxStringLength} = formatter.limits;

	try {
		const items: ResultNode[] = [];
		const iterator = sequence[Symbol.iterator]();

		let exhausted = false;
		while (items.length < maxEnumerableLength) {
			const next = iterator.next();
			if (next.done) {
				exhausted = true;
				break;
			}
			items.push(formatter.build(next.value, undefined, depth));
		}

		let hasMore = '';
		if (!exhausted) {
			hasMore = iterator.next().done ? '' : '+';
			iterator.return?.();
		}

		const count = `${items.length}${hasMore}`;
		const summary =
			'key' in sequence
				? `<grouping Count: ${count} Key: ${formatValue(Reflect.get(sequence, 'key'), maxStringLength)}>`
				: `<enumerable Count: ${count}>`;

		return createNode(label, truncate(summary, maxStringLength), items);
	} catch (error) {
		return createNode(label, `Threw ${kindOf(error)}`, [formatter.build(error, undefined, depth)]);
	}
}
