import { LeafValue, formatLeaf, parseLeaf } from './coerce';
import { StructuralMismatchError } from './errors';
import type { KeyMetadata } from './metadata';
import { PathSegment } from './pathUtils';
import { TypeSignature, isBasicSignature, isContainerKind } from './signature';

/**
 * One decomposed unit of a value. A node exclusively owns its children; the
 * root of a key's tree also owns the key's metadata overlay.
 */
export class ValueNode {
	private readonly childNodes: ValueNode[] = [];
	private leaf: LeafValue | undefined;

	/** Number of variant boxes unpacked to reach this value. */
	variantWrapping = 0;

	metadata?: KeyMetadata;

	constructor(
		public readonly name: string,
		public readonly signature: TypeSignature,
		leafValue?: LeafValue
	) {
		if (isBasicSignature(signature) !== (leafValue !== undefined)) {
			throw new StructuralMismatchError(
				`Node '${name}' of type '${signature.text}' ${leafValue ? 'cannot hold' : 'needs'} a leaf value.`
			);
		}

		this.leaf = leafValue;
	}

	get isCompound(): boolean {
		return isContainerKind(this.signature.kind);
	}

	get isVariantWrapped(): boolean {
		return this.variantWrapping > 0;
	}

	get leafValue(): LeafValue | undefined {
		return this.leaf;
	}

	get children(): readonly ValueNode[] {
		return this.childNodes;
	}

	append(child: ValueNode): void {
		this.expectCompound();
		this.childNodes.push(child);
	}

	/** Stores a child under its name, replacing an earlier child of the same name in place. */
	put(child: ValueNode): void {
		this.expectCompound();
		const index = this.childNodes.findIndex((existing) => existing.name === child.name);
		if (index === -1) {
			this.childNodes.push(child);
			return;
		}

		this.childNodes[index] = child;
	}

	/**
	 * Replaces the leaf value with the parsed text. Throws ValueCoercionError
	 * and keeps the previous value when the text is not a value of this kind.
	 */
	assign(text: string): void {
		if (!isBasicSignature(this.signature)) {
			throw new StructuralMismatchError(`Node '${this.name}' of type '${this.signature.text}' is not a value node.`);
		}

		this.leaf = parseLeaf(text, this.signature.kind);
	}

	child(segment: PathSegment): ValueNode | undefined {
		if (typeof segment === 'number') {
			return this.childNodes[segment];
		}

		return this.childNodes.find((candidate) => candidate.name === segment);
	}

	find(segments: readonly PathSegment[]): ValueNode | undefined {
		let current: ValueNode | undefined = this;
		for (const segment of segments) {
			current = current.child(segment);
			if (!current) {
				return undefined;
			}
		}

		return current;
	}

	/** Leaf text for value nodes, the type tag for compound ones. */
	displayValue(): string {
		return this.leaf ? formatLeaf(this.leaf) : this.signature.text;
	}

	private expectCompound(): void {
		if (!this.isCompound) {
			throw new StructuralMismatchError(`Node '${this.name}' of type '${this.signature.text}' cannot have children.`);
		}
	}
}
