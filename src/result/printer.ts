import type {ResultNode} from './node.ts';

/**
 * Renders a tree as indented text, two spaces per level, one node per line
 */
export function printResult(node: ResultNode): string {
	const lines: string[] = [];
	appendNode(node, 0, lines);
	return lines.map(line => `${line}\n`).join('');
}

function appendNode(node: ResultNode, level: number, lines: string[]): void {
	const text = node.label === undefined ? node.value : `${node.label} = ${node.value}`;
	lines.push('  '.repeat(level) + text);

	for (const child of node.children) {
		appendNode(child, level + 1, lines);
	}
}
