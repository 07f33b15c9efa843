import {z} from 'zod';
import {createNode, isExceptionResult, type ResultNode} from './node.ts';

type WireReference = {$ref: string};

type WireNode = {
	$id: string;
	label?: string;
	value: string;
	children: WireEntry[];
	message?: string;
	sourceLine?: number;
};

type WireEntry = WireNode | WireReference;

const wireEntrySchema: z.ZodType<WireEntry> = z.lazy(() =>
	z.union([
		z.object({$ref: z.string()}).strict(),
		z.object({
			$id: z.string(),
			label: z.string().optional(),
			value: z.string(),
			children: z.array(wireEntrySchema),
			message: z.string().optional(),
			sourceLine: z.number().int().optional(),
		}),
	]),
);

/**
 * Writes a tree as JSON for delivery to another process. Every node gets an `$id`;
 * a node instance met again is written as `{"$ref": id}` instead of being repeated.
 */
export function serializeResult(node: ResultNode): string {
	const ids = new Map<ResultNode, string>();

	const toWire = (current: ResultNode): WireEntry => {
		const existing = ids.get(current);
		if (existing !== undefined) {
			return {$ref: existing};
		}

		const $id = String(ids.size + 1);
		ids.set(current, $id);

		const wire: WireNode = {
			$id,
			...(current.label !== undefined ? {label: current.label} : {}),
			value: current.value,
			...(isExceptionResult(current)
				? {message: current.message, sourceLine: current.sourceLine}
				: {}),
			children: current.children.map(toWire),
		};

		return wire;
	};

	return JSON.stringify(toWire(node));
}

/**
 * Reads a tree written by {@link serializeResult}, restoring shared nodes as shared instances
 * @throws ZodError when the payload does not have the wire shape
 */
export function deserializeResult(text: string): ResultNode {
	const root = wireEntrySchema.parse(JSON.parse(text));
	const nodes = new Map<string, ResultNode>();

	const fromWire = (entry: WireEntry): ResultNode => {
		if ('$ref' in entry) {
			const target = nodes.get(entry.$ref);
			if (!target) {
				throw new Error(`Unknown node reference: ${entry.$ref}`);
			}
			return target;
		}

		const base = createNode(entry.label, entry.value, entry.children.map(fromWire));
		const node =
			entry.message !== undefined && entry.sourceLine !== undefined
				? Object.freeze({...base, message: entry.message, sourceLine: entry.sourceLine})
				: base;

		nodes.set(entry.$id, node);
		return node;
	};

	return fromWire(root);
}
