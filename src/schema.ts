import * as fs from 'fs/promises';
import * as path from 'path';
import { type ParseError, parse as parseJsonc, printParseErrorCode } from 'jsonc-parser';
import type { EditorConfiguration } from './config';
import { getErrorMessage } from './errors';
import { type KeyMetadata, NO_RANGE, type RangeDescriptor, normalizeRange } from './metadata';
import type { Notifier } from './notifier';
import { type TypeSignature, parseSignature } from './signature';
import type { Variant } from './variant';
import { fromJson } from './variantJson';

export interface SchemaDescription {
	readonly id: string;
	/**
	 * Fixed location of the schema's values. Relocatable schemas have none and
	 * live under whatever relocation path the caller picks.
	 */
	readonly path?: string;
	readonly keys: readonly KeyMetadata[];
}

export interface SchemaRegistry {
	listSchemas(): string[];
	lookup(schemaId: string): SchemaDescription | undefined;
}

export class SchemaSource implements SchemaRegistry {
	constructor(
		public readonly file: string,
		private readonly schemas: ReadonlyMap<string, SchemaDescription>,
		private readonly parent?: SchemaRegistry
	) {}

	listSchemas(): string[] {
		const ids = [...this.schemas.keys()];
		for (const id of this.parent?.listSchemas() ?? []) {
			if (!this.schemas.has(id)) {
				ids.push(id);
			}
		}

		return ids.sort();
	}

	lookup(schemaId: string): SchemaDescription | undefined {
		return this.schemas.get(schemaId) ?? this.parent?.lookup(schemaId);
	}
}

export async function readSchemaFile(
	file: string,
	notifier: Notifier,
	parent?: SchemaRegistry
): Promise<SchemaSource | undefined> {
	let text: string;
	try {
		text = await fs.readFile(file, 'utf8');
	} catch {
		return undefined;
	}

	const errors: ParseError[] = [];
	const raw: unknown = parseJsonc(text, errors, { allowTrailingComma: true });
	if (errors.length > 0) {
		notifier.error(`Failed to parse schema ${file}: ${printParseErrorCode(errors[0].error)}`);
		return undefined;
	}

	if (!isPlainObject(raw) || !isPlainObject(raw.schemas)) {
		notifier.error(`Failed to parse schema ${file}: expected a "schemas" object.`);
		return undefined;
	}

	return new SchemaSource(file, normalizeSchemas(raw.schemas, notifier), parent);
}

function normalizeSchemas(raw: Record<string, unknown>, notifier: Notifier): Map<string, SchemaDescription> {
	const result = new Map<string, SchemaDescription>();
	for (const [id, entry] of Object.entries(raw)) {
		if (!isPlainObject(entry)) {
			continue;
		}

		const keys: KeyMetadata[] = [];
		const rawKeys: Record<string, unknown> = isPlainObject(entry.keys) ? entry.keys : {};
		for (const [key, definition] of Object.entries(rawKeys)) {
			if (isPlainObject(definition)) {
				keys.push(normalizeKey(id, key, definition, notifier));
			}
		}

		const schemaPath = typeof entry.path === 'string' && entry.path.length > 0 ? ensureTrailingSlash(entry.path) : undefined;
		result.set(id, { id, path: schemaPath, keys });
	}

	return result;
}

function normalizeKey(
	schemaId: string,
	key: string,
	definition: Record<string, unknown>,
	notifier: Notifier
): KeyMetadata {
	const declaredType = typeof definition.type === 'string' ? definition.type.trim() : '';
	const summary = pickFirstString(definition.summary);
	const description = pickFirstString(definition.description, definition.help);
	const writable = definition.writable !== false;

	// An unparseable type is kept as is; the key then shows as not displayable.
	let signature: TypeSignature;
	try {
		signature = parseSignature(declaredType);
	} catch {
		return { schemaId, key, declaredType, range: NO_RANGE, summary, description, writable };
	}

	let defaultValue: Variant | undefined;
	if (definition.default !== undefined) {
		try {
			defaultValue = fromJson(signature, definition.default);
		} catch (error) {
			notifier.warn(`Ignoring default of ${schemaId}.${key}: ${getErrorMessage(error)}`);
		}
	}

	let range: RangeDescriptor = NO_RANGE;
	try {
		range = normalizeRange(definition.range, signature);
	} catch (error) {
		notifier.warn(`Ignoring range of ${schemaId}.${key}: ${getErrorMessage(error)}`);
	}

	return { schemaId, key, declaredType, defaultValue, range, summary, description, writable };
}

/**
 * Finds the schemas for a store file: an explicit schema file first, then
 * `<store name><suffix><ext>` beside the store, then in each search path.
 * Every file found is chained onto the one before it, so the first file wins
 * for a schema id and the later ones fill in the rest.
 */
export async function loadSchemaSource(
	storeFile: string,
	configuration: EditorConfiguration,
	notifier: Notifier
): Promise<SchemaSource | undefined> {
	const pathInfo = path.parse(storeFile);
	const extension = pathInfo.ext || '.json';
	const schemaName = `${pathInfo.name}${configuration.schemaSuffix}${extension}`;

	const candidates: string[] = [];
	if (configuration.schemaFile) {
		candidates.push(configuration.schemaFile);
	}

	candidates.push(path.join(pathInfo.dir, schemaName));
	for (const location of configuration.schemaSearchPaths) {
		candidates.push(path.join(location, schemaName));
	}

	const files = [...new Set(candidates.map((candidate) => path.resolve(candidate)))];
	let source: SchemaSource | undefined;
	for (const file of files.reverse()) {
		source = (await readSchemaFile(file, notifier, source)) ?? source;
	}

	return source;
}

function ensureTrailingSlash(location: string): string {
	return location.endsWith('/') ? location : `${location}/`;
}

function pickFirstString(...candidates: unknown[]): string | undefined {
	for (const entry of candidates) {
		if (typeof entry === 'string' && entry.trim().length > 0) {
			return entry.trim();
		}
	}

	return undefined;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}
