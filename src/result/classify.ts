import type {MemberRegistry} from './members.ts';

/**
 * The closed set every value is sorted into once, before any node is built
 */
export type Classified =
	| {kind: 'absent'; value: null | undefined}
	| {kind: 'error'; value: Error}
	| {kind: 'scalar'; value: unknown}
	| {kind: 'sequence'; value: Iterable<unknown> & object}
	| {kind: 'composite'; value: object};

export type ValueKind = Classified['kind'];

export function classify(value: unknown, registry: MemberRegistry): Classified {
	if (value === null || value === undefined) {
		return {kind: 'absent', value};
	}

	// string, number, bigint, boolean, symbol and function
	if (typeof value !== 'object') {
		return {kind: 'scalar', value};
	}

	if (isErrorLike(value)) {
		return {kind: 'error', value};
	}

	const tag = tagOf(value);
	if (tag === '[object Date]' || tag === '[object RegExp]' || registry.isRegisteredScalar(value)) {
		return {kind: 'scalar', value};
	}

	return isIterable(value) ? {kind: 'sequence', value} : {kind: 'composite', value};
}

export function tagOf(value: unknown): string {
	return Object.prototype.toString.call(value);
}

/**
 * Matches errors created in other realms too, such as a `node:vm` context
 */
export function isErrorLike(value: unknown): value is Error {
	return value instanceof Error || tagOf(value) === '[object Error]';
}

export function isIterable(value: object): value is Iterable<unknown> {
	return typeof Reflect.get(value, Symbol.iterator) === 'function';
}

/**
 * Short type name: constructor name for objects, capitalised `typeof` for primitives
 */
export function kindOf(value: unknown): string {
	if (value === null) {
		return 'Null';
	}

	if (typeof value === 'function') {
		return 'Function';
	}

	if (typeof value !== 'object') {
		const type = typeof value;
		return type.charAt(0).toUpperCase() + type.slice(1);
	}

	const ctor: unknown = Reflect.get(value, 'constructor');
	if (typeof ctor === 'function' && ctor.name) {
		return ctor.name;
	}

	return tagOf(value).slice('[object '.length, -1);
}

export type MemberRead = {ok: true; value: unknown} | {ok: false; error: unknown};

/**
 * Reads one property of an untrusted value, reporting a throwing accessor as data
 */
export function tryRead(owner: object, key: PropertyKey): MemberRead {
	try {
		return {ok: true, value: Reflect.get(owner, key)};
	} catch (error) {
		return {ok: false, error};
	}
}

export function qualifiedErrorName(error: object): string {
	const name = tryRead(error, 'name');
	const base =
		name.ok && typeof name.value === 'string' && name.value !== '' ? name.value : kindOf(error);
	const code = tryRead(error, 'code');

	return code.ok && typeof code.value === 'string' ? `${base} [${code.value}]` : base;
}

/**
 * Message text of a thrown value; `Threw <Kind>` when its `message` accessor throws
 */
export function errorMessage(error: unknown, maxLength: number): string {
	if (typeof error === 'object' && error !== null) {
		const message = tryRead(error, 'message');
		if (!message.ok) {
			return `Threw ${kindOf(message.error)}`;
		}
		if (typeof message.value === 'string') {
			return truncate(message.value, maxLength);
		}
	}

	return formatValue(error, maxLength);
}

export function truncate(text: string, maxLength: number): string {
	return text.length > maxLength ? text.slice(0, maxLength) : text;
}

/**
 * Null-safe display text of a value, cut to `maxLength` characters
 */
export function formatValue(value: unknown, maxLength: number): string {
	return truncate(toText(value), maxLength);
}

function toText(value: unknown): string {
	if (value === null) return '<null>';
	if (value === undefined) return '<undefined>';

	switch (typeof value) {
		case 'string':
			return value;
		case 'function':
			return describeFunction(value);
		case 'object':
			return describeObject(value);
		default:
			return String(value);
	}
}

function describeFunction(fn: Function): string {
	const name = fn.name || '(anonymous)';
	if (Function.prototype.toString.call(fn).startsWith('class')) {
		return `[class ${name}]`;
	}

	return fn.name ? `[Function: ${name}]` : '[Function (anonymous)]';
}

function describeObject(value: object): string {
	const tag = tagOf(value);

	if (tag === '[object Date]') {
		const time = Date.prototype.getTime.call(value);
		return Number.isNaN(time) ? 'Invalid Date' : new Date(time).toISOString();
	}

	if (Array.isArray(value)) {
		return `${kindOf(value)}(${value.length})`;
	}

	if (tag === '[object Map]' || tag === '[object Set]') {
		return `${kindOf(value)}(${String(Reflect.get(value, 'size'))})`;
	}

	if (ArrayBuffer.isView(value)) {
		const length: unknown = Reflect.get(value, 'length');
		return `${kindOf(value)}(${typeof length === 'number' ? length : value.byteLength})`;
	}

	if (typeof Reflect.get(value, 'toString') !== 'function') {
		return kindOf(value);
	}

	const text = String(value);
	return text.startsWith('[object ') ? kindOf(value) : text;
}
