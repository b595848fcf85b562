import { ValueCoercionError } from './errors';
import { BasicKind, IntegerKind, StringKind, parseSignatureList } from './signature';

export type LeafValue =
	| { readonly kind: 'boolean'; readonly value: boolean }
	| { readonly kind: 'integer'; readonly width: IntegerKind; readonly value: bigint }
	| { readonly kind: 'double'; readonly value: number }
	| { readonly kind: 'string'; readonly flavor: StringKind; readonly value: string };

const INTEGER_BOUNDS: Record<IntegerKind, readonly [bigint, bigint]> = {
	byte: [0n, 255n],
	int16: [-32768n, 32767n],
	uint16: [0n, 65535n],
	int32: [-2147483648n, 2147483647n],
	uint32: [0n, 4294967295n],
	int64: [-9223372036854775808n, 9223372036854775807n],
	uint64: [0n, 18446744073709551615n]
};

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DOUBLE_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const OBJECT_PATH_PATTERN = /^\/$|^(\/[A-Za-z0-9_]+)+$/;

export function leafKind(leaf: LeafValue): BasicKind {
	switch (leaf.kind) {
		case 'boolean':
		case 'double':
			return leaf.kind;
		case 'integer':
			return leaf.width;
		case 'string':
			return leaf.flavor;
	}
}

export function makeLeaf(kind: BasicKind, value: boolean | number | bigint | string): LeafValue {
	switch (kind) {
		case 'boolean':
			if (typeof value !== 'boolean') {
				throw new ValueCoercionError(String(value), 'boolean');
			}

			return { kind: 'boolean', value };
		case 'double':
			if (typeof value !== 'number') {
				throw new ValueCoercionError(String(value), 'double');
			}

			return { kind: 'double', value };
		case 'string':
		case 'objectPath':
		case 'signature':
			if (typeof value !== 'string') {
				throw new ValueCoercionError(String(value), kind);
			}

			return parseLeaf(value, kind);
		default:
			return makeInteger(kind, value);
	}
}

function makeInteger(width: IntegerKind, value: boolean | number | bigint | string): LeafValue {
	if (typeof value === 'bigint') {
		return checkInteger(String(value), width, value);
	}

	if (typeof value === 'number' && Number.isInteger(value)) {
		return checkInteger(String(value), width, BigInt(value));
	}

	if (typeof value === 'string') {
		return parseLeaf(value, width);
	}

	throw new ValueCoercionError(String(value), width, 'not an integer');
}

function checkInteger(text: string, width: IntegerKind, value: bigint): LeafValue {
	const [min, max] = INTEGER_BOUNDS[width];
	if (value < min || value > max) {
		throw new ValueCoercionError(text, width, `must be between ${min} and ${max}`);
	}

	return { kind: 'integer', width, value };
}

/**
 * Parses user-entered text into a leaf of the given kind. Never truncates or
 * guesses: text that does not denote a value of the kind throws.
 */
export function parseLeaf(text: string, kind: BasicKind): LeafValue {
	switch (kind) {
		case 'boolean':
			// Only the two display spellings are accepted.
			if (text === 'True') {
				return { kind: 'boolean', value: true };
			}

			if (text === 'False') {
				return { kind: 'boolean', value: false };
			}

			throw new ValueCoercionError(text, 'boolean', "expected 'True' or 'False'");
		case 'double':
			return { kind: 'double', value: parseDouble(text) };
		case 'string':
			return { kind: 'string', flavor: 'string', value: text };
		case 'objectPath':
			if (!OBJECT_PATH_PATTERN.test(text)) {
				throw new ValueCoercionError(text, 'object path');
			}

			return { kind: 'string', flavor: 'objectPath', value: text };
		case 'signature':
			try {
				parseSignatureList(text);
			} catch (error) {
				throw new ValueCoercionError(text, 'signature', error instanceof Error ? error.message : undefined);
			}

			return { kind: 'string', flavor: 'signature', value: text };
		default: {
			const trimmed = text.trim();
			if (!INTEGER_PATTERN.test(trimmed)) {
				throw new ValueCoercionError(text, kind, 'not an integer');
			}

			return checkInteger(text, kind, BigInt(trimmed));
		}
	}
}

function parseDouble(text: string): number {
	const trimmed = text.trim();
	const lowered = trimmed.toLowerCase();
	if (lowered === 'nan') {
		return Number.NaN;
	}

	if (lowered === 'inf' || lowered === '+inf' || lowered === 'infinity' || lowered === '+infinity') {
		return Number.POSITIVE_INFINITY;
	}

	if (lowered === '-inf' || lowered === '-infinity') {
		return Number.NEGATIVE_INFINITY;
	}

	if (!DOUBLE_PATTERN.test(trimmed)) {
		throw new ValueCoercionError(text, 'double', 'not a number');
	}

	return Number.parseFloat(trimmed);
}

export function formatLeaf(leaf: LeafValue): string {
	switch (leaf.kind) {
		case 'boolean':
			return leaf.value ? 'True' : 'False';
		case 'integer':
			return leaf.value.toString();
		case 'double':
			return formatDouble(leaf.value);
		case 'string':
			return leaf.value;
	}
}

function formatDouble(value: number): string {
	if (Number.isNaN(value)) {
		return 'nan';
	}

	if (!Number.isFinite(value)) {
		return value > 0 ? 'inf' : '-inf';
	}

	if (Object.is(value, -0)) {
		return '-0.0';
	}

	return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

/**
 * Converts a leaf to the slot's kind. A leaf already of that kind is returned
 * as is; anything else goes through its text form and must parse.
 */
export function coerceLeaf(leaf: LeafValue, kind: BasicKind): LeafValue {
	if (leafKind(leaf) === kind) {
		return leaf;
	}

	return parseLeaf(formatLeaf(leaf), kind);
}

export function leafEquals(a: LeafValue, b: LeafValue): boolean {
	if (leafKind(a) !== leafKind(b)) {
		return false;
	}

	if (a.kind === 'double' && b.kind === 'double') {
		return Object.is(a.value, b.value) || a.value === b.value;
	}

	return a.value === b.value;
}
