import { coerceLeaf, parseLeaf } from './coerce';
import { StructuralMismatchError } from './errors';
import { TypeSignature, formatSignature, isBasicSignature, signatureEquals } from './signature';
import { ValueNode } from './valueNode';
import { DictEntry, Variant, box, leafVariant } from './variant';

/**
 * Rebuilds the value of a (possibly edited) tree against the signature it
 * was decomposed from. Variant boxes removed while building the tree are put
 * back where they were.
 */
export function recompose(root: ValueNode, signature: TypeSignature): Variant {
	return recomposeSlot(root, signature);
}

function recomposeSlot(node: ValueNode, slot: TypeSignature): Variant {
	if (!node.isVariantWrapped) {
		return recomposeContent(node, slot);
	}

	if (slot.kind !== 'variant') {
		throw new StructuralMismatchError(
			`Node '${node.name}' was unpacked from a variant but sits in a '${slot.text}' slot.`
		);
	}

	let result = recomposeContent(node, node.signature);
	for (let depth = 0; depth < node.variantWrapping; depth += 1) {
		result = box(result);
	}

	return result;
}

function recomposeContent(node: ValueNode, signature: TypeSignature): Variant {
	if (isBasicSignature(signature)) {
		const leaf = node.leafValue;
		if (!leaf) {
			throw new StructuralMismatchError(`Node '${node.name}' has no value for type '${signature.text}'.`);
		}

		return leafVariant(coerceLeaf(leaf, signature.kind));
	}

	if (!signatureEquals(node.signature, signature)) {
		throw new StructuralMismatchError(
			`Node '${node.name}' has type '${node.signature.text}', expected '${signature.text}'.`
		);
	}

	const children = node.children;
	switch (signature.kind) {
		case 'array': {
			const element = signature.element;
			return {
				kind: 'array',
				type: formatSignature(signature),
				items: children.map((child) => recomposeSlot(child, element))
			};
		}
		case 'dictEntryArray': {
			const { key, value } = signature;
			const entries: DictEntry[] = children.map((child) => [
				leafVariant(parseLeaf(child.name, key.kind)),
				recomposeSlot(child, value)
			]);
			return { kind: 'dict', type: formatSignature(signature), entries };
		}
		case 'tuple': {
			if (children.length !== signature.elements.length) {
				throw new StructuralMismatchError(
					`Tuple '${node.name}' has ${children.length} element(s), type '${signature.text}' needs ${signature.elements.length}.`
				);
			}

			const items = signature.elements.map((element, index) => recomposeSlot(children[index], element));
			return { kind: 'tuple', type: formatSignature(signature), items };
		}
		case 'maybe':
			if (children.length > 1) {
				throw new StructuralMismatchError(`Maybe '${node.name}' has ${children.length} values.`);
			}

			return {
				kind: 'maybe',
				type: formatSignature(signature),
				inner: children.length === 0 ? null : recomposeSlot(children[0], signature.element)
			};
		case 'variant': {
			// Only a root keeps its wrapper node; the content re-boxes itself.
			if (children.length !== 1) {
				throw new StructuralMismatchError(`Variant '${node.name}' must hold exactly one value.`);
			}

			return recomposeSlot(children[0], signature);
		}
	}
}
