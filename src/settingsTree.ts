import { EventEmitter } from 'events';
import type { SettingsBackend } from './backend';
import { formatLeaf } from './coerce';
import { decomposeKey } from './decompose';
import { PersistenceRejectedError, getErrorMessage } from './errors';
import { type KeyMetadata, formatRange, resolveDefault, resolveDefaultAtPath } from './metadata';
import type { Notifier } from './notifier';
import { type PathSegment, appendPathKey, buildDisplayPath, buildPathKey } from './pathUtils';
import { recompose } from './recompose';
import type { SchemaRegistry } from './schema';
import { type TypeSignature, parseSignature } from './signature';
import type { ValueNode } from './valueNode';
import { type Variant, emptyValue, printVariant } from './variant';

export type SettingsNodeKind = 'schema' | 'key' | 'element' | 'unavailable';

export class SettingsNode {
	constructor(
		public readonly id: string,
		public readonly kind: SettingsNodeKind,
		options: {
			label: string;
			description?: string;
			collapsible: boolean;
			tooltip?: string;
			schemaId?: string;
			key?: string;
			segments?: PathSegment[];
		}
	) {
		this.label = options.label;
		this.description = options.description;
		this.collapsible = options.collapsible;
		this.tooltip = options.tooltip;
		this.schemaId = options.schemaId;
		this.key = options.key;
		this.segments = options.segments ?? [];
	}

	readonly label: string;
	readonly description?: string;
	readonly collapsible: boolean;
	readonly tooltip?: string;
	readonly schemaId?: string;
	readonly key?: string;
	/** Path from the key's root node to this node. */
	readonly segments: PathSegment[];
}

export interface KeyEntry {
	readonly metadata: KeyMetadata;
	readonly root?: ValueNode;
	/** Why the key cannot be displayed. */
	readonly error?: string;
}

export interface EditOptions {
	readonly type: string;
	/** Fixed choices for booleans and enumerated keys. */
	readonly choices?: string[];
}

const VARIANT_SIGNATURE = parseSignature('v');

export class SettingsTree {
	private readonly changes = new EventEmitter();
	private readonly entries = new Map<string, KeyEntry>();
	private relocationPath?: string;

	constructor(
		private readonly registry: SchemaRegistry,
		private readonly backend: SettingsBackend,
		private readonly notifier: Notifier
	) {}

	onDidChangeTreeData(listener: () => void): () => void {
		this.changes.on('change', listener);
		return () => this.changes.off('change', listener);
	}

	load(relocationPath?: string): void {
		this.entries.clear();
		this.relocationPath = relocationPath;

		const schemas = this.registry.listSchemas();
		if (schemas.length === 0) {
			this.notifier.warn('No schemas found.');
		}

		for (const schemaId of schemas) {
			for (const metadata of this.registry.lookup(schemaId)?.keys ?? []) {
				this.entries.set(entryKey(schemaId, metadata.key), this.buildEntry(metadata));
			}
		}

		this.changes.emit('change');
	}

	getEntry(schemaId: string, key: string): KeyEntry | undefined {
		return this.entries.get(entryKey(schemaId, key));
	}

	getChildren(element?: SettingsNode): SettingsNode[] {
		if (!element) {
			return this.schemaNodes('');
		}

		switch (element.kind) {
			case 'schema':
				return [...this.schemaNodes(element.id), ...this.keyNodes(element.id)];
			case 'key':
			case 'element': {
				const { schemaId, key, segments } = element;
				const node = this.findNode(element);
				if (!node || !schemaId || !key) {
					return [];
				}

				return node.children.map((child, index) =>
					this.createValueNode(schemaId, key, [...segments, childSegment(node, child, index)], child)
				);
			}
			default:
				return [];
		}
	}

	/** Text for the details pane of a key or one of its values. */
	describe(schemaId: string, key: string, segments: readonly PathSegment[] = []): string {
		const entry = this.getEntry(schemaId, key);
		if (!entry) {
			return `No key ${schemaId}.${key}.`;
		}

		const { metadata } = entry;
		const node = entry.root?.find(segments);
		const names = entry.root ? namesAlong(entry.root, segments) : [];
		const lines: string[] = [buildDisplayPath(schemaId, key, names), ''];

		lines.push(`Schema ID: ${schemaId}`);
		lines.push(metadata.summary ? `Key: ${key}\t(${metadata.summary})` : `Key: ${key}`);
		if (metadata.description) {
			lines.push('Description:', metadata.description);
		}

		if (entry.error) {
			lines.push('Value:', `(cannot display this key: ${entry.error})`);
		} else if (node) {
			if (segments.length > 0) {
				lines.push('Name:', node.name);
			}

			lines.push('Value:', this.formatNodeValue(node));
		}

		if (metadata.defaultValue) {
			lines.push('Default Value:', this.formatDefault(metadata.defaultValue, entry.root, segments));
		}

		if (metadata.range.type !== 'none') {
			lines.push('Range:', `${metadata.range.type} : ${formatRange(metadata.range)}`);
		}

		return lines.join('\n');
	}

	editOptions(schemaId: string, key: string, segments: readonly PathSegment[]): EditOptions | undefined {
		const entry = this.getEntry(schemaId, key);
		const node = entry?.root?.find(segments);
		if (!entry || !node || node.isCompound) {
			return undefined;
		}

		if (node.signature.kind === 'boolean') {
			return { type: node.signature.text, choices: ['True', 'False'] };
		}

		const range = entry.metadata.range;
		if (range.type === 'enum') {
			const choices = range.choices.flatMap((choice) => (choice.kind === 'leaf' ? [formatLeaf(choice.leaf)] : []));
			return { type: node.signature.text, choices };
		}

		return { type: node.signature.text };
	}

	/**
	 * Edits one leaf and commits the whole key. The tree is rebuilt from the
	 * store first, so nothing from an earlier failed edit leaks in. On any
	 * failure the stored value is left as it was.
	 */
	async editValue(
		schemaId: string,
		key: string,
		segments: readonly PathSegment[],
		text: string,
		relocationPath = this.relocationPath
	): Promise<boolean> {
		const metadata = this.registry.lookup(schemaId)?.keys.find((entry) => entry.key === key);
		if (!metadata) {
			this.notifier.warn(`No key ${schemaId}.${key}.`);
			return false;
		}

		const location = appendPathKey(`${schemaId}.${key}`, segments);
		let value: Variant;
		try {
			const declared = parseSignature(metadata.declaredType);
			const root = decomposeKey(metadata, this.readValue(metadata, declared, relocationPath));
			const node = root.find(segments);
			if (!node) {
				this.notifier.warn(`No value at ${location}.`);
				return false;
			}

			if (node.isCompound) {
				this.notifier.warn('Only value nodes can be edited.');
				return false;
			}

			node.assign(text);
			value = recompose(root, declared);
		} catch (error) {
			this.notifier.error(`Failed to update ${location}: ${getErrorMessage(error)}`);
			return false;
		}

		const result = await this.backend.write(schemaId, key, value, relocationPath);
		if (!result.ok) {
			this.notifier.error(new PersistenceRejectedError(result.reason).message);
			return false;
		}

		this.entries.set(entryKey(schemaId, key), this.buildEntry(metadata));
		this.changes.emit('change');
		return true;
	}

	private buildEntry(metadata: KeyMetadata): KeyEntry {
		try {
			const declared = parseSignature(metadata.declaredType);
			return { metadata, root: decomposeKey(metadata, this.readValue(metadata, declared)) };
		} catch (error) {
			return { metadata, error: getErrorMessage(error) };
		}
	}

	private readValue(metadata: KeyMetadata, declared: TypeSignature, relocationPath = this.relocationPath): Variant {
		return this.backend.read(metadata.schemaId, metadata.key, relocationPath) ?? emptyValue(declared);
	}

	private schemaNodes(prefix: string): SettingsNode[] {
		const depth = prefix ? prefix.split('.').length : 0;
		const groups = new Set<string>();
		for (const schemaId of this.registry.listSchemas()) {
			const parts = schemaId.split('.');
			if (parts.length > depth && (!prefix || schemaId.startsWith(`${prefix}.`))) {
				groups.add(parts.slice(0, depth + 1).join('.'));
			}
		}

		return [...groups].map((id) => {
			const label = id.slice(id.lastIndexOf('.') + 1);
			return new SettingsNode(id, 'schema', { label, collapsible: true, tooltip: id });
		});
	}

	private keyNodes(schemaId: string): SettingsNode[] {
		const schema = this.registry.lookup(schemaId);
		if (!schema) {
			return [];
		}

		return schema.keys.map((metadata) => {
			const entry = this.getEntry(schemaId, metadata.key);
			const id = `${schemaId}::${metadata.key}`;
			if (!entry?.root) {
				return new SettingsNode(id, 'unavailable', {
					label: metadata.key,
					description: 'cannot display this key',
					collapsible: false,
					tooltip: entry?.error,
					schemaId,
					key: metadata.key
				});
			}

			return new SettingsNode(id, 'key', {
				label: metadata.key,
				description: entry.root.displayValue(),
				collapsible: entry.root.isCompound,
				tooltip: metadata.summary,
				schemaId,
				key: metadata.key
			});
		});
	}

	private createValueNode(schemaId: string, key: string, segments: PathSegment[], node: ValueNode): SettingsNode {
		return new SettingsNode(`${schemaId}::${key}::${buildPathKey(segments)}`, 'element', {
			label: node.name,
			description: node.displayValue(),
			collapsible: node.isCompound,
			tooltip: `Path: ${appendPathKey(key, segments)}`,
			schemaId,
			key,
			segments
		});
	}

	private findNode(element: SettingsNode): ValueNode | undefined {
		if (!element.schemaId || !element.key) {
			return undefined;
		}

		return this.getEntry(element.schemaId, element.key)?.root?.find(element.segments);
	}

	private formatNodeValue(node: ValueNode): string {
		if (node.leafValue) {
			return formatLeaf(node.leafValue);
		}

		return printVariant(recompose(node, node.isVariantWrapped ? VARIANT_SIGNATURE : node.signature));
	}

	private formatDefault(defaultValue: Variant, root: ValueNode | undefined, segments: readonly PathSegment[]): string {
		if (!root || segments.length === 0) {
			return printVariant(resolveDefault(defaultValue, true, 0));
		}

		try {
			return printVariant(resolveDefaultAtPath(defaultValue, siblingIndexes(root, segments)));
		} catch (error) {
			return `(unavailable: ${getErrorMessage(error)})`;
		}
	}
}

function entryKey(schemaId: string, key: string): string {
	return `${schemaId}::${key}`;
}

// Array, tuple and maybe children are addressed by position, dictionary entries by key.
function childSegment(parent: ValueNode, child: ValueNode, index: number): PathSegment {
	return parent.signature.kind === 'dictEntryArray' ? child.name : index;
}

function namesAlong(root: ValueNode, segments: readonly PathSegment[]): string[] {
	const names: string[] = [];
	let current: ValueNode | undefined = root;
	for (const segment of segments) {
		current = current?.child(segment);
		if (current) {
			names.push(current.name);
		}
	}

	return names;
}

/** Sibling position at each level; a root variant wrapper adds no level of its own. */
function siblingIndexes(root: ValueNode, segments: readonly PathSegment[]): number[] {
	const indexes: number[] = [];
	let current = root;
	for (const segment of segments) {
		const child = current.child(segment);
		if (!child) {
			break;
		}

		if (current.signature.kind !== 'variant') {
			indexes.push(current.children.indexOf(child));
		}

		current = child;
	}

	return indexes;
}
