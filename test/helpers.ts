import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { type KeyMetadata, NO_RANGE } from '../src/metadata';
import { RecordingNotifier } from '../src/notifier';
import { type SchemaDescription, SchemaSource, readSchemaFile } from '../src/schema';

export const FIXTURES = path.join(__dirname, 'fixtures');
export const SCHEMA_FILE = path.join(FIXTURES, 'app_Schema.jsonc');

export async function loadFixtureSchema(notifier = new RecordingNotifier()): Promise<SchemaSource> {
	const schema = await readSchemaFile(SCHEMA_FILE, notifier);
	if (!schema) {
		throw new Error(`Fixture schema ${SCHEMA_FILE} did not load.`);
	}

	return schema;
}

export function createTempDir(): Promise<string> {
	return fs.mkdtemp(path.join(os.tmpdir(), 'settings-tree-'));
}

export function removeTempDir(dir: string): Promise<void> {
	return fs.rm(dir, { recursive: true, force: true });
}

export function keyMetadata(schemaId: string, key: string, declaredType: string): KeyMetadata {
	return { schemaId, key, declaredType, range: NO_RANGE, writable: true };
}

export function inlineSchema(...schemas: SchemaDescription[]): SchemaSource {
	return new SchemaSource('inline', new Map(schemas.map((schema) => [schema.id, schema])));
}
