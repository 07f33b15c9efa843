import {ValueFormatter, type FormatterOptions} from './formatter.ts';
import type {ResultNode} from './node.ts';

/**
 * Builds the display tree for a value produced by an evaluation
 * @param value Any runtime value, including ones whose members throw or never end
 * @param label Label of the root node
 * @param options Limits, member registry and script boundary, or a configured formatter
 * @returns A frozen tree owned by the caller
 */
export function createResult(
	value: unknown,
	label?: string,
	options: FormatterOptions | ValueFormatter = {},
): ResultNode {
	const formatter = options instanceof ValueFormatter ? options : new ValueFormatter(options);
	return formatter.build(value, label, 0);
}

export {createExceptionResult} from './exception.ts';
export {ValueFormatter, type FormatterOptions} from './formatter.ts';
export {DEFAULT_LIMITS, resolveLimits, type ResultLimits} from './limits.ts';
export {MemberRegistry, type MemberAccessor, type MemberTable} from './members.ts';
export {createNode, isExceptionResult, isLeaf, type ExceptionResultNode, type ResultNode} from './node.ts';
export {printResult} from './printer.ts';
export {Grouping, groupBy} from './sequence.ts';
export {
	SCRIPT_MARKER,
	markerBoundary,
	parseStackFrames,
	type ScriptBoundary,
	type StackFrame,
} from './stack.ts';
export {deserializeResult, serializeResult} from './transport.ts';
