import { formatLeaf } from './coerce';
import { TypeMismatchError } from './errors';
import type { KeyMetadata } from './metadata';
import { TypeSignature, isBasicSignature, parseSignature } from './signature';
import { ValueNode } from './valueNode';
import { Variant, expectType } from './variant';

/**
 * Builds the tree of a value. A variant at the root keeps its wrapper node,
 * whose single child is the unpacked content.
 */
export function decompose(signature: TypeSignature, value: Variant, name: string): ValueNode {
	if (signature.kind !== 'variant') {
		return decomposeNested(signature, value, name);
	}

	const wrapper = new ValueNode(name, signature);
	wrapper.append(decomposeNested(signature, value, name));
	return wrapper;
}

/**
 * Builds the tree of a value inside a container. A variant is replaced by its
 * content, which records how many boxes were removed.
 */
export function decomposeNested(signature: TypeSignature, value: Variant, name: string): ValueNode {
	if (isBasicSignature(signature)) {
		if (value.kind !== 'leaf') {
			throw new TypeMismatchError(signature.text, value.type);
		}

		expectType(signature, value);
		return new ValueNode(name, signature, value.leaf);
	}

	switch (signature.kind) {
		case 'array': {
			const node = compoundNode(signature, value, 'array', name);
			if (value.kind === 'array') {
				for (const [index, item] of value.items.entries()) {
					node.append(decomposeNested(signature.element, item, String(index)));
				}
			}

			return node;
		}
		case 'dictEntryArray': {
			const node = compoundNode(signature, value, 'dict', name);
			if (value.kind === 'dict') {
				for (const [key, entry] of value.entries) {
					node.put(decomposeNested(signature.value, entry, formatLeaf(key.leaf)));
				}
			}

			return node;
		}
		case 'tuple': {
			const node = compoundNode(signature, value, 'tuple', name);
			if (value.kind === 'tuple') {
				if (value.items.length !== signature.elements.length) {
					throw new TypeMismatchError(signature.text, value.type);
				}

				for (const [index, element] of signature.elements.entries()) {
					node.append(decomposeNested(element, value.items[index], String(index)));
				}
			}

			return node;
		}
		case 'maybe': {
			const node = compoundNode(signature, value, 'maybe', name);
			if (value.kind === 'maybe' && value.inner !== null) {
				node.append(decomposeNested(signature.element, value.inner, '0'));
			}

			return node;
		}
		case 'variant':
			return unpackVariant(signature, value, name);
	}
}

function compoundNode(signature: TypeSignature, value: Variant, kind: Variant['kind'], name: string): ValueNode {
	if (value.kind !== kind) {
		throw new TypeMismatchError(signature.text, value.type);
	}

	expectType(signature, value);
	return new ValueNode(name, signature);
}

function unpackVariant(signature: TypeSignature, value: Variant, name: string): ValueNode {
	if (value.kind !== 'variant') {
		throw new TypeMismatchError(signature.text, value.type);
	}

	const content = decomposeNested(parseSignature(value.inner.type), value.inner, name);
	content.variantWrapping += 1;
	return content;
}

/** Builds the tree for a key and attaches the key's metadata to its root. */
export function decomposeKey(metadata: KeyMetadata, value: Variant): ValueNode {
	const root = decompose(parseSignature(metadata.declaredType), value, metadata.key);
	root.metadata = metadata;
	return root;
}
