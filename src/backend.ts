import * as fs from 'fs/promises';
import { type ParseError, parse as parseJsonc, printParseErrorCode } from 'jsonc-parser';
import { getErrorMessage } from './errors';
import { type KeyMetadata, checkRange } from './metadata';
import type { SchemaRegistry } from './schema';
import { formatSignature, parseSignature } from './signature';
import type { Variant } from './variant';
import { type JsonValue, fromJson, toJson } from './variantJson';

export type WriteResult = { ok: true } | { ok: false; reason: string };

/** Stores values per (schema id or relocation path, key). */
export interface SettingsBackend {
	read(schemaId: string, key: string, relocationPath?: string): Variant | undefined;
	write(schemaId: string, key: string, value: Variant, relocationPath?: string): Promise<WriteResult>;
}

/** Only relocatable schemas, those without a fixed path, are stored under a relocation path. */
export function scopeOf(registry: SchemaRegistry, schemaId: string, relocationPath?: string): string {
	if (relocationPath === undefined || registry.lookup(schemaId)?.path !== undefined) {
		return schemaId;
	}

	return relocationPath;
}

function findKey(registry: SchemaRegistry, schemaId: string, key: string): KeyMetadata | undefined {
	return registry.lookup(schemaId)?.keys.find((entry) => entry.key === key);
}

/** Returns why the store refuses the value, or undefined when it accepts it. */
export function validateWrite(metadata: KeyMetadata | undefined, value: Variant): string | undefined {
	if (!metadata) {
		return 'No such key.';
	}

	if (!metadata.writable) {
		return `Key ${metadata.schemaId}.${metadata.key} is read-only.`;
	}

	const expected = formatSignature(parseSignature(metadata.declaredType));
	if (value.type !== expected) {
		return `Key ${metadata.schemaId}.${metadata.key} holds '${expected}', not '${value.type}'.`;
	}

	return checkRange(metadata.range, value);
}

export class MemorySettingsBackend implements SettingsBackend {
	private readonly values = new Map<string, Map<string, Variant>>();

	constructor(private readonly registry: SchemaRegistry) {}

	read(schemaId: string, key: string, relocationPath?: string): Variant | undefined {
		return this.values.get(scopeOf(this.registry, schemaId, relocationPath))?.get(key) ?? findKey(this.registry, schemaId, key)?.defaultValue;
	}

	async write(schemaId: string, key: string, value: Variant, relocationPath?: string): Promise<WriteResult> {
		const reason = validateWrite(findKey(this.registry, schemaId, key), value);
		if (reason) {
			return { ok: false, reason };
		}

		const scope = scopeOf(this.registry, schemaId, relocationPath);
		const values = this.values.get(scope) ?? new Map<string, Variant>();
		values.set(key, value);
		this.values.set(scope, values);
		return { ok: true };
	}
}

/**
 * Keeps values in a JSON file shaped `{ "<scope>": { "<key>": <json> } }`,
 * decoding each value with its key's declared type on read.
 */
export class JsonFileSettingsBackend implements SettingsBackend {
	private constructor(
		public readonly file: string,
		private readonly registry: SchemaRegistry,
		private readonly data: Record<string, Record<string, JsonValue>>,
		private readonly indentSize: number
	) {}

	static async open(file: string, registry: SchemaRegistry, indentSize = 2): Promise<JsonFileSettingsBackend> {
		let text: string | undefined;
		try {
			text = await fs.readFile(file, 'utf8');
		} catch (error) {
			if (!isMissingFile(error)) {
				throw new Error(`Failed to read store ${file}: ${getErrorMessage(error)}`);
			}
		}

		const data: Record<string, Record<string, JsonValue>> = {};
		if (text !== undefined && text.trim().length > 0) {
			const errors: ParseError[] = [];
			const raw: unknown = parseJsonc(text, errors, { allowTrailingComma: true });
			if (errors.length > 0) {
				throw new Error(`Failed to parse store ${file}: ${printParseErrorCode(errors[0].error)}`);
			}

			if (isJsonObject(raw)) {
				for (const [scope, values] of Object.entries(raw)) {
					if (isJsonObject(values)) {
						data[scope] = values;
					}
				}
			}
		}

		return new JsonFileSettingsBackend(file, registry, data, indentSize);
	}

	read(schemaId: string, key: string, relocationPath?: string): Variant | undefined {
		const metadata = findKey(this.registry, schemaId, key);
		const stored = this.data[scopeOf(this.registry, schemaId, relocationPath)]?.[key];
		if (stored === undefined || !metadata) {
			return metadata?.defaultValue;
		}

		return fromJson(metadata.declaredType, stored);
	}

	async write(schemaId: string, key: string, value: Variant, relocationPath?: string): Promise<WriteResult> {
		const reason = validateWrite(findKey(this.registry, schemaId, key), value);
		if (reason) {
			return { ok: false, reason };
		}

		const scope = scopeOf(this.registry, schemaId, relocationPath);
		const previous = this.data[scope];
		this.data[scope] = { ...previous, [key]: toJson(value) };
		try {
			await fs.writeFile(this.file, JSON.stringify(this.data, null, this.indentSize) + '\n', 'utf8');
		} catch (error) {
			if (previous) {
				this.data[scope] = previous;
			} else {
				delete this.data[scope];
			}

			return { ok: false, reason: `Failed to write ${this.file}: ${getErrorMessage(error)}` };
		}

		return { ok: true };
	}
}

function isJsonObject(value: unknown): value is Record<string, JsonValue> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMissingFile(error: unknown): boolean {
	return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
