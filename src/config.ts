import * as fs from 'fs/promises';
import * as path from 'path';
import { type ParseError, parse as parseJsonc, printParseErrorCode } from 'jsonc-parser';
import { getErrorMessage } from './errors';
import type { Notifier } from './notifier';

export const DEFAULT_CONFIG_FILE = 'settings-tree.jsonc';

export interface EditorConfiguration {
	/** Directories searched for `<store name><schemaSuffix><ext>` schema files. */
	schemaSearchPaths: string[];
	schemaSuffix: string;
	schemaFile?: string;
	storeFile: string;
	indentSize: number;
}

export function defaultConfiguration(baseDir = process.cwd()): EditorConfiguration {
	return {
		schemaSearchPaths: [],
		schemaSuffix: '_Schema',
		storeFile: path.join(baseDir, 'settings.json'),
		indentSize: 2
	};
}

export async function readConfiguration(file: string, notifier: Notifier): Promise<EditorConfiguration> {
	const baseDir = path.dirname(path.resolve(file));
	const configuration = defaultConfiguration(baseDir);

	let text: string;
	try {
		text = await fs.readFile(file, 'utf8');
	} catch {
		return configuration;
	}

	const errors: ParseError[] = [];
	const raw: unknown = parseJsonc(text, errors, { allowTrailingComma: true });
	if (errors.length > 0 || !isPlainObject(raw)) {
		const reason = errors.length > 0 ? printParseErrorCode(errors[0].error) : 'expected an object';
		notifier.error(`Failed to parse configuration ${file}: ${reason}`);
		return configuration;
	}

	try {
		return applyConfiguration(configuration, raw, baseDir);
	} catch (error) {
		notifier.error(`Invalid configuration ${file}: ${getErrorMessage(error)}`);
		return configuration;
	}
}

function applyConfiguration(
	configuration: EditorConfiguration,
	raw: Record<string, unknown>,
	baseDir: string
): EditorConfiguration {
	const result = { ...configuration };

	if (Array.isArray(raw.schemaSearchPaths)) {
		result.schemaSearchPaths = raw.schemaSearchPaths
			.filter((entry): entry is string => typeof entry === 'string' && entry.length > 0)
			.map((entry) => path.resolve(baseDir, entry));
	}

	if (typeof raw.schemaSuffix === 'string') {
		result.schemaSuffix = raw.schemaSuffix;
	}

	if (typeof raw.schemaFile === 'string' && raw.schemaFile.length > 0) {
		result.schemaFile = path.resolve(baseDir, raw.schemaFile);
	}

	if (typeof raw.storeFile === 'string' && raw.storeFile.length > 0) {
		result.storeFile = path.resolve(baseDir, raw.storeFile);
	}

	if (raw.indentSize !== undefined) {
		if (typeof raw.indentSize !== 'number' || !Number.isInteger(raw.indentSize)) {
			throw new Error('indentSize must be an integer.');
		}

		result.indentSize = Math.max(0, raw.indentSize);
	}

	return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}
