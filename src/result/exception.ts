import {errorMessage} from './classify.ts';
import {ValueFormatter, type FormatterOptions} from './formatter.ts';
import type {ExceptionResultNode} from './node.ts';
import {scriptLineNumber} from './stack.ts';

/**
 * Builds the tree for a thrown value at depth 0 and attaches its message
 * and the line of the innermost script frame
 * @param error Usually an Error, but any thrown value is accepted
 */
export function createExceptionResult(
	error: unknown,
	options: FormatterOptions | ValueFormatter = {},
): ExceptionResultNode {
	const formatter = options instanceof ValueFormatter ? options : new ValueFormatter(options);
	const node = formatter.build(error, undefined, 0);

	const sourceLine =
		typeof error === 'object' && error !== null ? scriptLineNumber(error, formatter.boundary) : 0;

	return Object.freeze({
		...node,
		message: errorMessage(error, formatter.limits.maxStringLength),
		sourceLine,
	});
}
