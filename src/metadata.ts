import { LeafValue, formatLeaf, leafEquals } from './coerce';
import { IndexOutOfRangeError } from './errors';
import { BasicSignature, TypeSignature, isBasicSignature } from './signature';
import { Variant, printVariant } from './variant';
import { fromJson } from './variantJson';

export type RangeDescriptor =
	| { readonly type: 'none' }
	| { readonly type: 'range'; readonly min: Variant; readonly max: Variant }
	| { readonly type: 'enum'; readonly choices: readonly Variant[] };

export const NO_RANGE: RangeDescriptor = { type: 'none' };

/** Descriptive data attached to the root of a key's tree. */
export interface KeyMetadata {
	readonly schemaId: string;
	readonly key: string;
	readonly declaredType: string;
	readonly defaultValue?: Variant;
	readonly range: RangeDescriptor;
	readonly summary?: string;
	readonly description?: string;
	readonly writable: boolean;
}

/**
 * Picks the default shown for a node. A scalar default, or a query for the
 * whole compound value, yields the default unchanged; an element of a
 * compound value gets the default at its sibling position.
 */
export function resolveDefault(defaultValue: Variant, isCompoundWhole: boolean, siblingIndex: number): Variant {
	if (isCompoundWhole) {
		return defaultValue;
	}

	const elements = positionalElements(defaultValue);
	if (!elements) {
		return defaultValue;
	}

	if (siblingIndex < 0 || siblingIndex >= elements.length) {
		throw new IndexOutOfRangeError(siblingIndex, elements.length);
	}

	return elements[siblingIndex];
}

export function resolveDefaultAtPath(defaultValue: Variant, siblingIndexes: readonly number[]): Variant {
	return siblingIndexes.reduce((current, index) => resolveDefault(current, false, index), defaultValue);
}

function positionalElements(value: Variant): readonly Variant[] | undefined {
	switch (value.kind) {
		case 'leaf':
			return undefined;
		case 'array':
		case 'tuple':
			return value.items;
		case 'dict':
			return value.entries.map(([, entry]) => entry);
		case 'maybe':
			return value.inner ? [value.inner] : [];
		case 'variant':
			return positionalElements(value.inner);
	}
}

export function normalizeRange(raw: unknown, signature: TypeSignature): RangeDescriptor {
	const elementType = rangeElementType(signature);
	if (!elementType || raw === undefined || raw === null) {
		return NO_RANGE;
	}

	if (Array.isArray(raw)) {
		return raw.length > 0 ? enumRange(raw, elementType) : NO_RANGE;
	}

	if (isPlainObject(raw)) {
		if (Array.isArray(raw.choices) && raw.choices.length > 0) {
			return enumRange(raw.choices, elementType);
		}

		if (raw.min !== undefined && raw.max !== undefined) {
			return { type: 'range', min: fromJson(elementType, raw.min), max: fromJson(elementType, raw.max) };
		}

		return NO_RANGE;
	}

	if (typeof raw === 'string' && raw.trim().length > 0) {
		const parsed = parseRangeString(raw, elementType);
		if (parsed) {
			return parsed;
		}

		const items = parseEnumString(raw);
		if (items.length > 0) {
			return enumRange(items, elementType);
		}
	}

	return NO_RANGE;
}

function rangeElementType(signature: TypeSignature): BasicSignature | undefined {
	if (isBasicSignature(signature)) {
		return signature;
	}

	if (signature.kind === 'array' && isBasicSignature(signature.element)) {
		return signature.element;
	}

	return undefined;
}

function enumRange(choices: unknown[], elementType: BasicSignature): RangeDescriptor {
	return { type: 'enum', choices: choices.map((choice) => fromJson(elementType, choice)) };
}

function parseRangeString(raw: string, elementType: BasicSignature): RangeDescriptor | undefined {
	const match = raw.trim().match(/^(-?\d+(?:\.\d+)?)\s*[-~]\s*(-?\d+(?:\.\d+)?)$/);
	if (!match) {
		return undefined;
	}

	const isInteger = elementType.kind !== 'double';
	const min = isInteger ? match[1] : Number.parseFloat(match[1]);
	const max = isInteger ? match[2] : Number.parseFloat(match[2]);
	return { type: 'range', min: fromJson(elementType, min), max: fromJson(elementType, max) };
}

function parseEnumString(raw: string): string[] {
	return raw
		.split(/[|,;]/)
		.map((entry) => entry.trim())
		.filter((entry) => entry.length > 0);
}

/** Returns why the value violates the range, or undefined when it fits. */
export function checkRange(range: RangeDescriptor, value: Variant): string | undefined {
	if (range.type === 'none') {
		return undefined;
	}

	if (value.kind === 'array') {
		for (const item of value.items) {
			const violation = checkRange(range, item);
			if (violation) {
				return violation;
			}
		}

		return undefined;
	}

	if (value.kind !== 'leaf') {
		return undefined;
	}

	if (range.type === 'enum') {
		const leaf = value.leaf;
		const allowed = range.choices.some((choice) => choice.kind === 'leaf' && leafEquals(choice.leaf, leaf));
		return allowed ? undefined : `Value ${printVariant(value)} is not one of ${formatRange(range)}.`;
	}

	if (range.min.kind !== 'leaf' || range.max.kind !== 'leaf') {
		return undefined;
	}

	const below = compareLeaf(value.leaf, range.min.leaf) < 0;
	const above = compareLeaf(value.leaf, range.max.leaf) > 0;
	if (below || above) {
		return `Value ${printVariant(value)} is outside the range ${formatRange(range)}.`;
	}

	return undefined;
}

function compareLeaf(a: LeafValue, b: LeafValue): number {
	if (a.kind === 'integer' && b.kind === 'integer') {
		return a.value < b.value ? -1 : a.value > b.value ? 1 : 0;
	}

	if (a.kind === 'double' && b.kind === 'double') {
		return a.value - b.value;
	}

	return formatLeaf(a).localeCompare(formatLeaf(b));
}

export function formatRange(range: RangeDescriptor): string {
	switch (range.type) {
		case 'none':
			return '';
		case 'range':
			return `[${printVariant(range.min)}, ${printVariant(range.max)}]`;
		case 'enum':
			return `[${range.choices.map(printVariant).join(', ')}]`;
	}
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}
