export type ResultNode = {
	readonly label?: string;
	readonly value: string;
	readonly children: readonly ResultNode[];
};

export type ExceptionResultNode = ResultNode & {
	readonly message: string;
	readonly sourceLine: number;
};

/**
 * Creates a frozen node. `label` is omitted from the object when undefined.
 */
export function createNode(
	label: string | undefined,
	value: string,
	children: readonly ResultNode[] = [],
): ResultNode {
	const frozenChildren = Object.freeze([...children]);
	if (label === undefined) {
		return Object.freeze({value, children: frozenChildren});
	}

	return Object.freeze({label, value, children: frozenChildren});
}

export function isLeaf(node: ResultNode): boolean {
	return node.children.length === 0;
}

export function isExceptionResult(node: ResultNode): node is ExceptionResultNode {
	return 'message' in node && 'sourceLine' in node;
}
