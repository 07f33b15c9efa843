import {tryRead} from './classify.ts';

/**
 * Prefix carried by the file name of every dynamically compiled script,
 * e.g. `ℛsubmission-3`. Host code never uses it.
 */
export const SCRIPT_MARKER = 'ℛ';

export type StackFrame = {
	raw: string;
	functionName?: string;
	fileName?: string;
	line?: number;
	column?: number;
};

export type ScriptBoundary = {
	isScriptFrame(frame: StackFrame): boolean;
};

export function markerBoundary(marker: string = SCRIPT_MARKER): ScriptBoundary {
	return {
		isScriptFrame: frame => frame.fileName?.startsWith(marker) === true,
	};
}

const FRAME_LINE = /^\s*at\s+(.+)$/;
const LOCATION = /^(.*?):(\d+):(\d+)$/;

/**
 * Parses V8 `error.stack` text. Header and message lines are skipped.
 * Frames come back innermost first, as V8 prints them.
 */
export function parseStackFrames(stack: string): StackFrame[] {
	const frames: StackFrame[] = [];

	for (const line of stack.split('\n')) {
		const match = line.match(FRAME_LINE);
		if (match) {
			frames.push(parseFrame(match[1].trimEnd()));
		}
	}

	return frames;
}

function parseFrame(body: string): StackFrame {
	const frame: StackFrame = {raw: `at ${body}`};
	let location = body;

	const open = body.indexOf(' (');
	if (open !== -1 && body.endsWith(')')) {
		frame.functionName = body.slice(0, open);
		location = body.slice(open + 2, -1);
	}

	const match = location.match(LOCATION);
	if (match) {
		frame.fileName = match[1];
		frame.line = parseInt(match[2], 10);
		frame.column = parseInt(match[3], 10);
	} else {
		frame.fileName = location;
	}

	return frame;
}

export function readStackFrames(error: object): StackFrame[] {
	const stack: unknown = Reflect.get(error, 'stack');
	return typeof stack === 'string' ? parseStackFrames(stack) : [];
}

/**
 * Keeps frames from the innermost one through the outermost script frame,
 * dropping the host frames that invoked the script. Empty when no frame is a script frame.
 */
export function filterScriptFrames(frames: StackFrame[], boundary: ScriptBoundary): StackFrame[] {
	let index: number;
	for (index = frames.length - 1; index >= 0; --index) {
		if (boundary.isScriptFrame(frames[index])) {
			break;
		}
	}

	return frames.slice(0, index + 1);
}

export function renderStackTrace(error: object, boundary: ScriptBoundary): string {
	return filterScriptFrames(readStackFrames(error), boundary)
		.map(frame => frame.raw)
		.join('\n');
}

const LOCATION_HEADER = /^(.*):(\d+)$/;

/**
 * Compile errors carry their position in the first stack line (`file:line`) rather than in a frame
 */
export function parseLocationHeader(stack: string): StackFrame | undefined {
	const header = stack.split('\n', 1)[0];
	const match = header.match(LOCATION_HEADER);
	if (!match) {
		return undefined;
	}

	return {raw: header, fileName: match[1], line: parseInt(match[2], 10)};
}

/**
 * Line of the innermost script frame, 0 when unresolved or when `stack` cannot be read
 */
export function scriptLineNumber(error: object, boundary: ScriptBoundary): number {
	const stack = tryRead(error, 'stack');
	if (!stack.ok || typeof stack.value !== 'string') {
		return 0;
	}

	const frame = parseStackFrames(stack.value).find(candidate => boundary.isScriptFrame(candidate));
	if (frame) {
		return frame.line ?? 0;
	}

	const header = parseLocationHeader(stack.value);
	return header && boundary.isScriptFrame(header) ? (header.line ?? 0) : 0;
}
