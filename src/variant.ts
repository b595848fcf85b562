import { LeafValue, formatLeaf, leafEquals, leafKind, makeLeaf } from './coerce';
import { TypeMismatchError } from './errors';
import {
	BasicKind,
	TypeSignature,
	basicSignature,
	formatSignature,
	parseSignature
} from './signature';

export interface LeafVariant {
	readonly kind: 'leaf';
	readonly type: string;
	readonly leaf: LeafValue;
}

export interface ArrayVariant {
	readonly kind: 'array';
	readonly type: string;
	readonly items: readonly Variant[];
}

export type DictEntry = readonly [key: LeafVariant, value: Variant];

export interface DictVariant {
	readonly kind: 'dict';
	readonly type: string;
	readonly entries: readonly DictEntry[];
}

export interface TupleVariant {
	readonly kind: 'tuple';
	readonly type: string;
	readonly items: readonly Variant[];
}

export interface MaybeVariant {
	readonly kind: 'maybe';
	readonly type: string;
	readonly inner: Variant | null;
}

/** A boxed value that carries its own type string. */
export interface BoxedVariant {
	readonly kind: 'variant';
	readonly type: 'v';
	readonly inner: Variant;
}

export type Variant = LeafVariant | ArrayVariant | DictVariant | TupleVariant | MaybeVariant | BoxedVariant;

export function leafVariant(leaf: LeafValue): LeafVariant {
	return { kind: 'leaf', type: basicSignature(leafKind(leaf)).text, leaf };
}

export function basicVariant(kind: BasicKind, value: boolean | number | bigint | string): LeafVariant {
	return leafVariant(makeLeaf(kind, value));
}

export const boolean = (value: boolean): LeafVariant => basicVariant('boolean', value);
export const byte = (value: number | bigint): LeafVariant => basicVariant('byte', value);
export const int16 = (value: number | bigint): LeafVariant => basicVariant('int16', value);
export const uint16 = (value: number | bigint): LeafVariant => basicVariant('uint16', value);
export const int32 = (value: number | bigint): LeafVariant => basicVariant('int32', value);
export const uint32 = (value: number | bigint): LeafVariant => basicVariant('uint32', value);
export const int64 = (value: number | bigint): LeafVariant => basicVariant('int64', value);
export const uint64 = (value: number | bigint): LeafVariant => basicVariant('uint64', value);
export const double = (value: number): LeafVariant => basicVariant('double', value);
export const string = (value: string): LeafVariant => basicVariant('string', value);
export const objectPath = (value: string): LeafVariant => basicVariant('objectPath', value);
export const signature = (value: string): LeafVariant => basicVariant('signature', value);

export function array(elementType: string, items: readonly Variant[]): ArrayVariant {
	const element = parseSignature(elementType);
	for (const item of items) {
		expectType(element, item);
	}

	return { kind: 'array', type: `a${formatSignature(element)}`, items };
}

export function dict(keyType: string, valueType: string, entries: readonly DictEntry[]): DictVariant {
	const type = parseSignature(`a{${keyType}${valueType}}`);
	if (type.kind !== 'dictEntryArray') {
		throw new TypeMismatchError('a{..}', type.text);
	}

	for (const [key, value] of entries) {
		expectType(type.key, key);
		expectType(type.value, value);
	}

	return { kind: 'dict', type: formatSignature(type), entries };
}

export function tuple(items: readonly Variant[]): TupleVariant {
	return { kind: 'tuple', type: `(${items.map((item) => item.type).join('')})`, items };
}

export function maybe(elementType: string, inner: Variant | null): MaybeVariant {
	const element = parseSignature(elementType);
	if (inner) {
		expectType(element, inner);
	}

	return { kind: 'maybe', type: `m${formatSignature(element)}`, inner };
}

export function box(inner: Variant): BoxedVariant {
	return { kind: 'variant', type: 'v', inner };
}

export function variantSignature(value: Variant): TypeSignature {
	return parseSignature(value.type);
}

/** Throws TypeMismatchError unless the value is of the given static type. */
export function expectType(expected: TypeSignature, value: Variant): void {
	if (formatSignature(expected) !== value.type) {
		throw new TypeMismatchError(formatSignature(expected), value.type);
	}
}

export function variantEquals(a: Variant, b: Variant): boolean {
	if (a.type !== b.type) {
		return false;
	}

	switch (a.kind) {
		case 'leaf':
			return b.kind === 'leaf' && leafEquals(a.leaf, b.leaf);
		case 'array':
		case 'tuple':
			return (b.kind === 'array' || b.kind === 'tuple') && itemsEqual(a.items, b.items);
		case 'dict':
			return (
				b.kind === 'dict' &&
				a.entries.length === b.entries.length &&
				a.entries.every(
					([key, value], index) => variantEquals(key, b.entries[index][0]) && variantEquals(value, b.entries[index][1])
				)
			);
		case 'maybe':
			if (b.kind !== 'maybe') {
				return false;
			}

			if (a.inner === null || b.inner === null) {
				return a.inner === b.inner;
			}

			return variantEquals(a.inner, b.inner);
		case 'variant':
			return b.kind === 'variant' && variantEquals(a.inner, b.inner);
	}
}

function itemsEqual(a: readonly Variant[], b: readonly Variant[]): boolean {
	return a.length === b.length && a.every((item, index) => variantEquals(item, b[index]));
}

/** Renders a value in GVariant text form, e.g. `{'dpi': <96>}`. */
export function printVariant(value: Variant): string {
	switch (value.kind) {
		case 'leaf':
			return printLeaf(value.leaf);
		case 'array':
			return `[${value.items.map(printVariant).join(', ')}]`;
		case 'tuple':
			return value.items.length === 1
				? `(${printVariant(value.items[0])},)`
				: `(${value.items.map(printVariant).join(', ')})`;
		case 'dict':
			return `{${value.entries.map(([key, entry]) => `${printVariant(key)}: ${printVariant(entry)}`).join(', ')}}`;
		case 'maybe':
			if (value.inner === null) {
				return 'nothing';
			}

			return value.inner.kind === 'maybe' ? `just ${printVariant(value.inner)}` : printVariant(value.inner);
		case 'variant':
			return `<${printVariant(value.inner)}>`;
	}
}

function printLeaf(leaf: LeafValue): string {
	switch (leaf.kind) {
		case 'boolean':
			return leaf.value ? 'true' : 'false';
		case 'string':
			return `'${leaf.value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
		default:
			return formatLeaf(leaf);
	}
}

/** The empty value of a type: zero, '', false, no elements, nothing. */
export function emptyValue(type: TypeSignature): Variant {
	switch (type.kind) {
		case 'boolean':
			return boolean(false);
		case 'double':
			return double(0);
		case 'string':
			return string('');
		case 'objectPath':
			return objectPath('/');
		case 'signature':
			return signature('');
		case 'variant':
			return box(tuple([]));
		case 'maybe':
			return { kind: 'maybe', type: formatSignature(type), inner: null };
		case 'array':
			return { kind: 'array', type: formatSignature(type), items: [] };
		case 'dictEntryArray':
			return { kind: 'dict', type: formatSignature(type), entries: [] };
		case 'tuple':
			return tuple(type.elements.map(emptyValue));
		default:
			return basicVariant(type.kind, 0);
	}
}
