import { describe, expect, it } from 'vitest';
import { decompose, decomposeKey } from '../src/decompose';
import { TypeMismatchError } from '../src/errors';
import { NO_RANGE } from '../src/metadata';
import { parseSignature } from '../src/signature';
import type { ValueNode } from '../src/valueNode';
import { array, box, boolean, dict, int32, maybe, string, tuple, uint32 } from '../src/variant';

function shape(node: ValueNode): unknown {
	return {
		name: node.name,
		type: node.signature.text,
		wrapping: node.variantWrapping,
		value: node.isCompound ? undefined : node.displayValue(),
		children: node.children.map(shape)
	};
}

describe('decompose', () => {
	it('turns a leaf into a single value node', () => {
		const node = decompose(parseSignature('i'), int32(42), 'volume');
		expect(node.isCompound).toBe(false);
		expect(node.name).toBe('volume');
		expect(node.displayValue()).toBe('42');
		expect(node.children).toHaveLength(0);
	});

	it('names array children by index', () => {
		const node = decompose(parseSignature('as'), array('s', [string('a'), string('b')]), 'favorites');
		expect(node.isCompound).toBe(true);
		expect(node.displayValue()).toBe('as');
		expect(node.children.map((child) => [child.name, child.displayValue()])).toEqual([
			['0', 'a'],
			['1', 'b']
		]);
	});

	it('names dictionary children by key', () => {
		const value = dict('s', 'i', [
			[string('width'), int32(640)],
			[string('height'), int32(480)]
		]);
		const node = decompose(parseSignature('a{si}'), value, 'size');
		expect(node.children.map((child) => child.name)).toEqual(['width', 'height']);
		expect(node.child('height')?.displayValue()).toBe('480');
	});

	it('keeps the last value of a repeated dictionary key', () => {
		const value = dict('s', 'i', [
			[string('a'), int32(1)],
			[string('b'), int32(2)],
			[string('a'), int32(3)]
		]);
		const node = decompose(parseSignature('a{si}'), value, 'map');
		expect(node.children.map((child) => [child.name, child.displayValue()])).toEqual([
			['a', '3'],
			['b', '2']
		]);
	});

	it('gives an absent maybe no children and a present one a single child', () => {
		const absent = decompose(parseSignature('mi'), maybe('i', null), 'limit');
		expect(absent.isCompound).toBe(true);
		expect(absent.children).toHaveLength(0);

		const present = decompose(parseSignature('mi'), maybe('i', int32(3)), 'limit');
		expect(present.children.map((child) => [child.name, child.displayValue()])).toEqual([['0', '3']]);
	});

	it('flattens a variant nested inside tuples', () => {
		const value = tuple([string('a'), tuple([boolean(true), box(int32(42))])]);
		const root = decompose(parseSignature('(s(bv))'), value, 'entry');

		const inner = root.find([1]);
		expect(inner?.children).toHaveLength(2);

		const leaf = root.find([1, 1]);
		expect(leaf?.isCompound).toBe(false);
		expect(leaf?.signature.kind).toBe('int32');
		expect(leaf?.isVariantWrapped).toBe(true);
		expect(leaf?.variantWrapping).toBe(1);
		expect(leaf?.displayValue()).toBe('42');
	});

	it('counts every box of a variant holding a variant', () => {
		const root = decompose(parseSignature('av'), array('v', [box(box(uint32(7)))]), 'list');
		const element = root.find([0]);
		expect(element?.variantWrapping).toBe(2);
		expect(element?.signature.kind).toBe('uint32');
	});

	it('keeps the wrapper node of a variant at the root', () => {
		const root = decompose(parseSignature('v'), box(int32(42)), 'value');
		expect(root.signature.kind).toBe('variant');
		expect(root.isCompound).toBe(true);
		expect(root.isVariantWrapped).toBe(false);
		expect(root.children).toHaveLength(1);

		const content = root.children[0];
		expect(content.name).toBe('value');
		expect(content.displayValue()).toBe('42');
		expect(content.variantWrapping).toBe(1);
	});

	it('unpacks compound variant content with its discovered type', () => {
		const root = decompose(parseSignature('a{sv}'), dict('s', 'v', [[string('list'), box(array('i', [int32(1)]))]]), 'opts');
		const list = root.child('list');
		expect(list?.signature.text).toBe('ai');
		expect(list?.isCompound).toBe(true);
		expect(list?.variantWrapping).toBe(1);
		expect(list?.find([0])?.displayValue()).toBe('1');
	});

	it('rejects values that do not match the signature', () => {
		expect(() => decompose(parseSignature('as'), int32(1), 'x')).toThrow(TypeMismatchError);
		expect(() => decompose(parseSignature('i'), string('1'), 'x')).toThrow(TypeMismatchError);
		expect(() => decompose(parseSignature('(ii)'), tuple([int32(1)]), 'x')).toThrow(TypeMismatchError);
		expect(() => decompose(parseSignature('v'), int32(1), 'x')).toThrow(TypeMismatchError);
	});

	it('produces the same tree for the same value', () => {
		const signature = parseSignature('(ia{sv}mas)');
		const value = tuple([
			int32(1),
			dict('s', 'v', [[string('k'), box(string('v'))]]),
			maybe('as', array('s', [string('x')]))
		]);
		expect(shape(decompose(signature, value, 'root'))).toEqual(shape(decompose(signature, value, 'root')));
	});
});

describe('decomposeKey', () => {
	it('attaches the key metadata to the root only', () => {
		const metadata = {
			schemaId: 'org.example.app',
			key: 'favorites',
			declaredType: 'as',
			range: NO_RANGE,
			writable: true
		};
		const root = decomposeKey(metadata, array('s', [string('a')]));
		expect(root.name).toBe('favorites');
		expect(root.metadata).toBe(metadata);
		expect(root.children[0].metadata).toBeUndefined();
	});
});
