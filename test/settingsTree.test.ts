import { beforeEach, describe, expect, it, vi } from 'vitest';
import { MemorySettingsBackend } from '../src/backend';
import { RecordingNotifier } from '../src/notifier';
import type { SchemaSource } from '../src/schema';
import { type SettingsNode, SettingsTree } from '../src/settingsTree';
import { array, printVariant, string } from '../src/variant';
import { inlineSchema, keyMetadata, loadFixtureSchema } from './helpers';

describe('SettingsTree', () => {
	let schema: SchemaSource;
	let backend: MemorySettingsBackend;
	let notifier: RecordingNotifier;
	let tree: SettingsTree;

	beforeEach(async () => {
		schema = await loadFixtureSchema();
		backend = new MemorySettingsBackend(schema);
		notifier = new RecordingNotifier();
		tree = new SettingsTree(schema, backend, notifier);
		tree.load();
	});

	function stored(schemaId: string, key: string, relocationPath?: string): string | undefined {
		const value = backend.read(schemaId, key, relocationPath);
		return value && printVariant(value);
	}

	function childByLabel(items: SettingsNode[], label: string): SettingsNode {
		const item = items.find((candidate) => candidate.label === label);
		if (!item) {
			throw new Error(`No item labelled ${label}.`);
		}

		return item;
	}

	function appNode(): SettingsNode {
		const org = childByLabel(tree.getChildren(), 'org');
		const example = childByLabel(tree.getChildren(org), 'example');
		return childByLabel(tree.getChildren(example), 'app');
	}

	describe('getChildren', () => {
		it('groups schemas by their dotted id', () => {
			const roots = tree.getChildren();
			expect(roots.map((item) => item.label)).toEqual(['org']);
			expect(tree.getChildren(roots[0]).map((item) => item.id)).toEqual(['org.example', 'org.other']);
		});

		it('lists nested schemas before keys', () => {
			const children = tree.getChildren(appNode());
			expect(children.map((item) => item.label)).toEqual([
				'window',
				'volume',
				'favorites',
				'enabled',
				'mode',
				'extras',
				'history',
				'locked',
				'broken'
			]);
		});

		it('shows leaf values and compound types', () => {
			const children = tree.getChildren(appNode());
			const volume = childByLabel(children, 'volume');
			expect(volume.kind).toBe('key');
			expect(volume.description).toBe('5');
			expect(volume.collapsible).toBe(false);
			expect(volume.tooltip).toBe('Output volume');

			const favorites = childByLabel(children, 'favorites');
			expect(favorites.description).toBe('as');
			expect(favorites.collapsible).toBe(true);

			const history = childByLabel(children, 'history');
			expect(history.description).toBe('ai');
			expect(tree.getChildren(history)).toEqual([]);
		});

		it('marks keys that cannot be displayed', () => {
			const broken = childByLabel(tree.getChildren(appNode()), 'broken');
			expect(broken.kind).toBe('unavailable');
			expect(broken.description).toBe('cannot display this key');
			expect(broken.tooltip).toBe("Malformed type signature 'a{' at 2: signature ended early");
			expect(tree.getChildren(broken)).toEqual([]);
		});

		it('lists the elements of compound values', () => {
			const favorites = childByLabel(tree.getChildren(appNode()), 'favorites');
			const elements = tree.getChildren(favorites);
			expect(elements.map((item) => [item.label, item.description])).toEqual([
				['0', 'a'],
				['1', 'b'],
				['2', 'c']
			]);
			expect(elements[2].segments).toEqual([2]);
			expect(elements[2].tooltip).toBe('Path: favorites[2]');

			const extras = childByLabel(tree.getChildren(appNode()), 'extras');
			const dpi = tree.getChildren(extras)[0];
			expect(dpi.segments).toEqual(['dpi']);
			expect(dpi.description).toBe('96');
			expect(dpi.tooltip).toBe('Path: extras.dpi');
		});
	});

	describe('describe', () => {
		it('shows the details of a key', () => {
			expect(tree.describe('org.example.app', 'volume')).toBe(
				[
					'org.example.app.volume',
					'',
					'Schema ID: org.example.app',
					'Key: volume\t(Output volume)',
					'Description:',
					'Volume in steps.',
					'Value:',
					'5',
					'Default Value:',
					'5',
					'Range:',
					'range : [0, 10]'
				].join('\n')
			);
		});

		it('shows the default at the sibling position of an element', () => {
			expect(tree.describe('org.example.app', 'favorites', [1])).toBe(
				[
					'org.example.app.favorites.1',
					'',
					'Schema ID: org.example.app',
					'Key: favorites\t(Favorite items)',
					'Name:',
					'1',
					'Value:',
					'b',
					'Default Value:',
					"'b'"
				].join('\n')
			);
		});

		it('shows a compound value in text form', () => {
			expect(tree.describe('org.example.app', 'extras').split('\n').slice(-4)).toEqual([
				'Value:',
				"{'dpi': <96>}",
				'Default Value:',
				"{'dpi': <96>}"
			]);
		});

		it('says when an element has no default', async () => {
			await backend.write('org.example.app', 'favorites', array('s', ['w', 'x', 'y', 'z'].map(string)));
			tree.load();
			expect(tree.describe('org.example.app', 'favorites', [3]).split('\n').slice(-2)).toEqual([
				'Default Value:',
				'(unavailable: Index 3 is out of range for a default of 3 element(s).)'
			]);
		});

		it('explains why a key cannot be displayed', () => {
			expect(tree.describe('org.example.app', 'broken')).toBe(
				[
					'org.example.app.broken',
					'',
					'Schema ID: org.example.app',
					'Key: broken',
					'Value:',
					"(cannot display this key: Malformed type signature 'a{' at 2: signature ended early)"
				].join('\n')
			);
		});
	});

	describe('editOptions', () => {
		it('offers fixed choices for booleans and enums', () => {
			expect(tree.editOptions('org.example.app', 'enabled', [])).toEqual({ type: 'b', choices: ['True', 'False'] });
			expect(tree.editOptions('org.example.app', 'mode', [])).toEqual({ type: 's', choices: ['low', 'high'] });
			expect(tree.editOptions('org.example.app', 'volume', [])).toEqual({ type: 'i' });
			expect(tree.editOptions('org.example.app', 'favorites', [])).toBeUndefined();
		});
	});

	describe('editValue', () => {
		it('commits an edited leaf and refreshes the tree', async () => {
			const listener = vi.fn();
			tree.onDidChangeTreeData(listener);

			expect(await tree.editValue('org.example.app', 'volume', [], '7')).toBe(true);
			expect(stored('org.example.app', 'volume')).toBe('7');
			expect(tree.getEntry('org.example.app', 'volume')?.root?.displayValue()).toBe('7');
			expect(listener).toHaveBeenCalledTimes(1);
			expect(notifier.messages).toEqual([]);
		});

		it('edits one element of a compound value', async () => {
			expect(await tree.editValue('org.example.app', 'favorites', [1], 'z')).toBe(true);
			expect(stored('org.example.app', 'favorites')).toBe("['a', 'z', 'c']");

			expect(await tree.editValue('org.example.app', 'extras', ['dpi'], '120')).toBe(true);
			expect(stored('org.example.app', 'extras')).toBe("{'dpi': <120>}");

			expect(await tree.editValue('org.example.app.window', 'size', [0], '800')).toBe(true);
			expect(stored('org.example.app.window', 'size')).toBe('(800, 480)');
		});

		it('creates a value for keys without one', async () => {
			expect(stored('org.other', 'level')).toBeUndefined();
			expect(tree.getEntry('org.other', 'level')?.root?.displayValue()).toBe('0');
			expect(await tree.editValue('org.other', 'level', [], '200')).toBe(true);
			expect(stored('org.other', 'level')).toBe('200');
		});

		it('reports text that does not convert and keeps the store', async () => {
			expect(await tree.editValue('org.example.app', 'volume', [], 'abc')).toBe(false);
			expect(await tree.editValue('org.example.app', 'enabled', [], 'yes')).toBe(false);
			expect(notifier.of('error')).toEqual([
				"Failed to update org.example.app.volume: Cannot convert 'abc' to int32: not an integer",
				"Failed to update org.example.app.enabled: Cannot convert 'yes' to boolean: expected 'True' or 'False'"
			]);
			expect(stored('org.example.app', 'volume')).toBe('5');
			expect(stored('org.example.app', 'enabled')).toBe('true');
		});

		it('reports values the store rejects', async () => {
			const listener = vi.fn();
			tree.onDidChangeTreeData(listener);

			expect(await tree.editValue('org.example.app', 'volume', [], '11')).toBe(false);
			expect(await tree.editValue('org.example.app', 'locked', [], 'open')).toBe(false);
			expect(notifier.of('error')).toEqual([
				'Value 11 is outside the range [0, 10].',
				'Key org.example.app.locked is read-only.'
			]);
			expect(stored('org.example.app', 'volume')).toBe('5');
			expect(listener).not.toHaveBeenCalled();
		});

		it('only edits value nodes that exist', async () => {
			expect(await tree.editValue('org.example.app', 'favorites', [], 'x')).toBe(false);
			expect(await tree.editValue('org.example.app', 'favorites', [5], 'x')).toBe(false);
			expect(await tree.editValue('org.example.app', 'nope', [], 'x')).toBe(false);
			expect(notifier.of('warning')).toEqual([
				'Only value nodes can be edited.',
				'No value at org.example.app.favorites[5].',
				'No key org.example.app.nope.'
			]);
		});

		it('writes relocatable schemas under the relocation path', async () => {
			tree.load('/custom/window/');
			expect(await tree.editValue('org.example.app.window', 'size', [0], '800')).toBe(true);
			expect(stored('org.example.app.window', 'size', '/custom/window/')).toBe('(800, 480)');
			expect(stored('org.example.app.window', 'size')).toBe('(640, 480)');
		});

		it('keeps schemas with a fixed path out of the relocation path', async () => {
			const registry = inlineSchema(
				{ id: 'org.a', path: '/org/a/', keys: [keyMetadata('org.a', 'k', 'i')] },
				{ id: 'org.b', keys: [keyMetadata('org.b', 'k', 's')] }
			);
			const store = new MemorySettingsBackend(registry);
			expect(await store.write('org.b', 'k', string('hello'), '/x/')).toEqual({ ok: true });

			const relocated = new SettingsTree(registry, store, notifier);
			relocated.load('/x/');
			expect(relocated.getEntry('org.a', 'k')?.error).toBeUndefined();
			expect(relocated.getEntry('org.b', 'k')?.error).toBeUndefined();

			expect(await relocated.editValue('org.a', 'k', [], '5')).toBe(true);
			expect(notifier.of('error')).toEqual([]);
			const fixed = store.read('org.a', 'k');
			const moved = store.read('org.b', 'k', '/x/');
			expect(fixed && printVariant(fixed)).toBe('5');
			expect(moved && printVariant(moved)).toBe("'hello'");
		});
	});

	it('unsubscribes listeners', () => {
		const listener = vi.fn();
		const dispose = tree.onDidChangeTreeData(listener);
		dispose();
		tree.load();
		expect(listener).not.toHaveBeenCalled();
	});
});
