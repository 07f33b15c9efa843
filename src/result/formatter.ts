import {
	classify,
	errorMessage,
	formatValue,
	kindOf,
	qualifiedErrorName,
	truncate,
	type Classified,
} from './classify.ts';
import {resolveLimits, type ResultLimits} from './limits.ts';
import {defaultMembers, errorMembers, MemberRegistry, type MemberAccessor} from './members.ts';
import {createNode, type ResultNode} from './node.ts';
import {buildSequence} from './sequence.ts';
import {markerBoundary, renderStackTrace, type ScriptBoundary} from './stack.ts';

export type FormatterOptions = {
	limits?: Partial<ResultLimits>;
	members?: MemberRegistry;
	boundary?: ScriptBoundary;
};

/**
 * Recursive value-to-tree builder. Holds no per-build state,
 * so one instance can serve any number of independent builds.
 */
export class ValueFormatter {
	readonly limits: ResultLimits;
	readonly registry: MemberRegistry;
	readonly boundary: ScriptBoundary;

	constructor(options: FormatterOptions = {}) {
		this.limits = resolveLimits(options.limits);
		this.registry = options.members ?? new MemberRegistry();
		this.boundary = options.boundary ?? markerBoundary();
	}

	/**
	 * Builds the node for a value outside any member context (a root value or a sequence element)
	 * @param label Label used unless the value is an error, which is labelled by its type name
	 * @param depth Distance of the produced node from the root
	 */
	build(value: unknown, label: string | undefined, depth: number): ResultNode {
		const {maxDepth, maxStringLength} = this.limits;
		const classified = classify(value, this.registry);

		if (classified.kind === 'absent') {
			return createNode(label, formatValue(value, maxStringLength));
		}

		if (typeof value === 'string') {
			return createNode(label, truncate(value, maxStringLength));
		}

		const targetDepth = depth + 1;
		if (targetDepth >= maxDepth) {
			return this.headerValue(classified, label);
		}

		switch (classified.kind) {
			case 'sequence':
				return buildSequence(this, classified.value, label, targetDepth);
			case 'scalar':
				return this.headerValue(classified, label);
			case 'error':
			case 'composite': {
				const header = this.headerValue(classified, label);
				const children = this.membersOf(classified).map(member =>
					this.buildMember(member, targetDepth),
				);
				return createNode(header.label, header.value, children);
			}
		}
	}

	/**
	 * Builds the node for one named member of an enclosing object
	 * @param depth Distance of the member node from the root
	 */
	buildMember(member: MemberAccessor, depth: number): ResultNode {
		const {maxDepth, maxStringLength} = this.limits;

		let value: unknown;
		try {
			value = member.read();
		} catch (error) {
			return createNode(member.name, `Threw ${kindOf(error)}`, [
				this.build(error, undefined, depth + 1),
			]);
		}

		const classified = classify(value, this.registry);
		switch (classified.kind) {
			case 'absent':
			case 'scalar':
				return createNode(member.name, formatValue(value, maxStringLength));
			case 'sequence':
				return buildSequence(this, classified.value, member.name, depth + 1);
			case 'error':
			case 'composite': {
				const expansion = depth + 1 < maxDepth ? [this.build(value, undefined, depth + 1)] : [];
				return createNode(member.name, formatValue(value, maxStringLength), expansion);
			}
		}
	}

	private headerValue(classified: Classified, label: string | undefined): ResultNode {
		const {maxStringLength} = this.limits;

		if (classified.kind === 'error') {
			return createNode(
				qualifiedErrorName(classified.value),
				errorMessage(classified.value, maxStringLength),
			);
		}

		return createNode(label, formatValue(classified.value, maxStringLength));
	}

	private membersOf(classified: Classified & {kind: 'error' | 'composite'}): MemberAccessor[] {
		const owner = classified.value;
		const table = this.registry.tableFor(owner);
		if (table) {
			return table(owner);
		}

		if (classified.kind === 'error') {
			return errorMembers(owner, () => renderStackTrace(owner, this.boundary));
		}

		return defaultMembers(owner);
	}
}
