#!/usr/bin/env node
/**
 * settings-tree - browse and edit typed settings from the command line
 *
 * Usage:
 *   settings-tree list                                  - Print every schema, key and value
 *   settings-tree describe <schema> <key> [node-path]   - Print the details of a key or value
 *   settings-tree set <schema> <key> <node-path> <value> - Edit one value and save it
 */

import * as path from 'path';
import { JsonFileSettingsBackend } from './backend';
import { DEFAULT_CONFIG_FILE, readConfiguration } from './config';
import { getErrorMessage } from './errors';
import { ConsoleNotifier, type Notifier } from './notifier';
import { parsePathKey } from './pathUtils';
import { loadSchemaSource } from './schema';
import { type SettingsNode, SettingsTree } from './settingsTree';

export interface CliOptions {
	command?: string;
	args: string[];
	config?: string;
	schemas?: string;
	store?: string;
	relocationPath?: string;
	help?: boolean;
}

export interface Output {
	write(text: string): unknown;
}

export function parseArgs(args: readonly string[]): CliOptions {
	const options: CliOptions = { args: [] };

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];

		if (arg === '--config' || arg === '-c') {
			options.config = args[++i];
		} else if (arg === '--schemas' || arg === '-s') {
			options.schemas = args[++i];
		} else if (arg === '--store') {
			options.store = args[++i];
		} else if (arg === '--path' || arg === '-p') {
			options.relocationPath = args[++i];
		} else if (arg === '--help' || arg === '-h') {
			options.help = true;
		} else if (!options.command) {
			options.command = arg;
		} else {
			options.args.push(arg);
		}
	}

	return options;
}

const HELP = `
settings-tree - browse and edit typed settings

Usage:
  settings-tree <command> [options]

Commands:
  list                                    Print every schema, key and value
  describe <schema> <key> [node-path]     Print the details of a key or value
  set <schema> <key> <node-path> <value>  Edit one value and save it

Options:
  -c, --config <file>    Configuration file (default: ${DEFAULT_CONFIG_FILE})
  -s, --schemas <file>   Schema file
      --store <file>     Settings store file
  -p, --path <path>      Relocation path for relocatable schemas
  -h, --help             Show this help message

Node paths address values inside a key: favorites[2], [0].name
`;

/** Runs one command and returns the process exit code. */
export async function runCli(
	argv: readonly string[],
	notifier: Notifier = new ConsoleNotifier(),
	out: Output = process.stdout
): Promise<number> {
	const options = parseArgs(argv);
	if (options.help || !options.command) {
		out.write(HELP);
		return options.help ? 0 : 1;
	}

	const configuration = await readConfiguration(options.config ?? DEFAULT_CONFIG_FILE, notifier);
	if (options.schemas) {
		configuration.schemaFile = path.resolve(options.schemas);
	}

	if (options.store) {
		configuration.storeFile = path.resolve(options.store);
	}

	const registry = await loadSchemaSource(configuration.storeFile, configuration, notifier);
	if (!registry) {
		notifier.error(`No schema found for ${configuration.storeFile}.`);
		return 1;
	}

	let backend: JsonFileSettingsBackend;
	try {
		backend = await JsonFileSettingsBackend.open(configuration.storeFile, registry, configuration.indentSize);
	} catch (error) {
		notifier.error(getErrorMessage(error));
		return 1;
	}

	const tree = new SettingsTree(registry, backend, notifier);
	tree.load(options.relocationPath);

	switch (options.command) {
		case 'list': {
			const lines: string[] = [];
			renderItems(tree, tree.getChildren(), 0, lines);
			out.write(lines.map((line) => `${line}\n`).join(''));
			return 0;
		}
		case 'describe': {
			const [schemaId, key, nodePath] = options.args;
			if (!schemaId || !key) {
				notifier.error('Usage: settings-tree describe <schema> <key> [node-path]');
				return 1;
			}

			if (!tree.getEntry(schemaId, key)) {
				notifier.error(`No key ${schemaId}.${key}.`);
				return 1;
			}

			out.write(`${tree.describe(schemaId, key, parsePathKey(nodePath ?? ''))}\n`);
			return 0;
		}
		case 'set': {
			const [schemaId, key, nodePath, text] = options.args;
			if (!schemaId || !key || nodePath === undefined || text === undefined) {
				notifier.error('Usage: settings-tree set <schema> <key> <node-path> <value>');
				return 1;
			}

			const saved = await tree.editValue(schemaId, key, parsePathKey(nodePath), text);
			if (saved) {
				notifier.info(`Saved ${schemaId}.${key} to ${configuration.storeFile}.`);
			}

			return saved ? 0 : 1;
		}
		default:
			notifier.error(`Unknown command '${options.command}'.`);
			return 1;
	}
}

function renderItems(tree: SettingsTree, items: SettingsNode[], depth: number, lines: string[]): void {
	const indent = '  '.repeat(depth);
	for (const item of items) {
		lines.push(item.description === undefined ? `${indent}${item.label}` : `${indent}${item.label}: ${item.description}`);
		if (item.collapsible) {
			renderItems(tree, tree.getChildren(item), depth + 1, lines);
		}
	}
}

if (require.main === module) {
	runCli(process.argv.slice(2)).then(
		(code) => {
			process.exitCode = code;
		},
		(error: unknown) => {
			console.error('Error:', getErrorMessage(error));
			process.exitCode = 1;
		}
	);
}
