import { LeafValue, formatLeaf, makeLeaf, parseLeaf } from './coerce';
import { TypeMismatchError } from './errors';
import { TypeSignature, formatSignature, parseSignature } from './signature';
import { DictEntry, Variant, box, leafVariant, variantSignature } from './variant';

const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

/**
 * Plain JSON form of a typed value, used by schema files and the JSON store.
 *
 * - integers are numbers (64-bit values outside the safe range are strings)
 * - doubles are numbers, or 'nan' / 'inf' / '-inf' / '-0.0'
 * - arrays and tuples are JSON arrays, dictionaries are objects
 * - an absent maybe is `null`; a present maybe whose element is itself a
 *   maybe is `{ "just": <json> }`, so `just nothing` stays apart from `nothing`
 * - a variant is `{ "type": "<signature>", "value": <json> }`
 */
export function fromJson(type: TypeSignature | string, json: unknown): Variant {
	const signature = typeof type === 'string' ? parseSignature(type) : type;

	switch (signature.kind) {
		case 'variant': {
			if (!isPlainObject(json) || typeof json.type !== 'string' || !('value' in json)) {
				throw new TypeMismatchError('v', describeJson(json));
			}

			return box(fromJson(json.type, json.value));
		}
		case 'maybe': {
			const type = formatSignature(signature);
			if (json === null || json === undefined) {
				return { kind: 'maybe', type, inner: null };
			}

			if (signature.element.kind !== 'maybe') {
				return { kind: 'maybe', type, inner: fromJson(signature.element, json) };
			}

			if (!isPlainObject(json) || !('just' in json)) {
				throw new TypeMismatchError(signature.text, describeJson(json));
			}

			return { kind: 'maybe', type, inner: fromJson(signature.element, json.just) };
		}
		case 'array': {
			if (!Array.isArray(json)) {
				throw new TypeMismatchError(signature.text, describeJson(json));
			}

			return {
				kind: 'array',
				type: formatSignature(signature),
				items: json.map((item: unknown) => fromJson(signature.element, item))
			};
		}
		case 'dictEntryArray': {
			if (!isPlainObject(json)) {
				throw new TypeMismatchError(signature.text, describeJson(json));
			}

			const entries: DictEntry[] = Object.entries(json).map(([key, value]) => [
				leafVariant(parseLeaf(key, signature.key.kind)),
				fromJson(signature.value, value)
			]);
			return { kind: 'dict', type: formatSignature(signature), entries };
		}
		case 'tuple': {
			if (!Array.isArray(json) || json.length !== signature.elements.length) {
				throw new TypeMismatchError(signature.text, describeJson(json));
			}

			const components: unknown[] = json;
			return {
				kind: 'tuple',
				type: formatSignature(signature),
				items: signature.elements.map((element, index) => fromJson(element, components[index]))
			};
		}
		case 'double':
			if (typeof json === 'string') {
				return leafVariant(parseLeaf(json, 'double'));
			}

			return leafVariant(makeLeaf('double', expectScalar(signature, json)));
		default: {
			const scalar = expectScalar(signature, json);
			return leafVariant(makeLeaf(signature.kind, scalar));
		}
	}
}

function expectScalar(signature: TypeSignature, json: unknown): boolean | number | string {
	if (typeof json === 'boolean' || typeof json === 'number' || typeof json === 'string') {
		return json;
	}

	throw new TypeMismatchError(signature.text, describeJson(json));
}

export function toJson(value: Variant): JsonValue {
	switch (value.kind) {
		case 'leaf':
			return leafToJson(value.leaf);
		case 'array':
		case 'tuple':
			return value.items.map(toJson);
		case 'dict': {
			const result: { [key: string]: JsonValue } = {};
			for (const [key, entry] of value.entries) {
				result[formatLeaf(key.leaf)] = toJson(entry);
			}

			return result;
		}
		case 'maybe':
			if (value.inner === null) {
				return null;
			}

			return value.inner.kind === 'maybe' ? { just: toJson(value.inner) } : toJson(value.inner);
		case 'variant':
			return { type: formatSignature(variantSignature(value.inner)), value: toJson(value.inner) };
	}
}

function leafToJson(leaf: LeafValue): JsonValue {
	switch (leaf.kind) {
		case 'boolean':
		case 'string':
			return leaf.value;
		case 'integer':
			return leaf.value >= MIN_SAFE && leaf.value <= MAX_SAFE ? Number(leaf.value) : leaf.value.toString();
		case 'double':
			// JSON has no negative zero.
			return Number.isFinite(leaf.value) && !Object.is(leaf.value, -0) ? leaf.value : formatLeaf(leaf);
	}
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeJson(value: unknown): string {
	if (value === null) {
		return 'null';
	}

	return Array.isArray(value) ? 'array' : typeof value;
}
