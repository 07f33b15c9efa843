export type MemberAccessor = {
	readonly name: string;
	read(): unknown;
};

type Constructor = Function;

export type MemberTable = (owner: object) => MemberAccessor[];

/**
 * Explicit per-type accessor tables and scalar registrations, keyed by constructor identity.
 * Lookups walk the prototype chain, so a table registered for a base class applies to subclasses.
 */
export class MemberRegistry {
	private tables = new Map<Constructor, MemberTable>();
	private scalars = new Set<Constructor>();

	register(ctor: Constructor, table: MemberTable): this {
		this.tables.set(ctor, table);
		return this;
	}

	/**
	 * Shorthand for a table that reads a fixed list of member names
	 */
	registerNames(ctor: Constructor, names: readonly string[]): this {
		return this.register(ctor, owner => names.map(name => readerFor(owner, name)));
	}

	registerScalar(ctor: Constructor): this {
		this.scalars.add(ctor);
		return this;
	}

	isRegisteredScalar(value: object): boolean {
		return this.findOnChain(value, ctor => this.scalars.has(ctor)) !== undefined;
	}

	tableFor(value: object): MemberTable | undefined {
		const ctor = this.findOnChain(value, candidate => this.tables.has(candidate));
		return ctor ? this.tables.get(ctor) : undefined;
	}

	private findOnChain(
		value: object,
		matches: (ctor: Constructor) => boolean,
	): Constructor | undefined {
		if (this.tables.size === 0 && this.scalars.size === 0) {
			return undefined;
		}

		let proto: object | null = Object.getPrototypeOf(value);
		while (proto && Object.getPrototypeOf(proto) !== null) {
			const descriptor = Object.getOwnPropertyDescriptor(proto, 'constructor');
			const ctor: unknown = descriptor?.value;
			if (typeof ctor === 'function' && matches(ctor)) {
				return ctor;
			}
			proto = Object.getPrototypeOf(proto);
		}

		return undefined;
	}
}

export function readerFor(owner: object, name: string): MemberAccessor {
	return {
		name,
		read: () => Reflect.get(owner, name, owner),
	};
}

/**
 * Own enumerable string keys, then getters declared on the prototype chain.
 * The chain's root (`Object.prototype` of whichever realm made the value) is not read.
 */
export function defaultMembers(owner: object): MemberAccessor[] {
	const names = new Set(Object.keys(owner));

	let proto: object | null = Object.getPrototypeOf(owner);
	while (proto && Object.getPrototypeOf(proto) !== null) {
		for (const key of Object.getOwnPropertyNames(proto)) {
			if (key === 'constructor' || key === '__proto__') continue;

			const descriptor = Object.getOwnPropertyDescriptor(proto, key);
			if (descriptor?.get) {
				names.add(key);
			}
		}
		proto = Object.getPrototypeOf(proto);
	}

	return [...names].map(name => readerFor(owner, name));
}

const ERROR_MEMBERS = ['name', 'message', 'stack'];

export function errorMembers(owner: object, readStack: () => string): MemberAccessor[] {
	const members: MemberAccessor[] = [
		readerFor(owner, 'name'),
		readerFor(owner, 'message'),
		{name: 'stack', read: readStack},
	];

	const extra = [
		...['cause', 'errors'].filter(name => name in owner),
		...Object.keys(owner),
	];
	const seen = new Set(ERROR_MEMBERS);
	for (const name of extra) {
		if (seen.has(name)) continue;
		seen.add(name);
		members.push(readerFor(owner, name));
	}

	return members;
}
