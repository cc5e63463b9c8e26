/**
 * Shared command-line helpers for scripts
 */

import 'dotenv/config';
import {existsSync} from 'node:fs';
import {resolve} from 'node:path';

/**
 * Parse command line arguments for a specific option
 *
 * @param args - Command line arguments array
 * @param name - Argument name (e.g., '--output')
 * @returns The argument value, or undefined if not found
 */
export function getArg(args: string[], name: string): string | undefined {
	const index = args.indexOf(name);
	if (index !== -1 && args[index + 1]) {
		return args[index + 1];
	}
	return undefined;
}

/**
 * Parse a numeric option
 *
 * @throws Error if the value is present but not an integer
 */
export function getIntArg(args: string[], name: string): number | undefined {
	const value = getArg(args, name);
	if (value === undefined) return undefined;
	const parsed = Number(value);
	if (!Number.isInteger(parsed)) {
		throw new Error(`${name} expects an integer (got "${value}")`);
	}
	return parsed;
}

/**
 * Read a --flag / --no-flag pair; undefined when neither is given
 */
export function getToggle(args: string[], name: string): boolean | undefined {
	if (args.includes(`--no-${name}`)) return false;
	if (args.includes(`--${name}`)) return true;
	return undefined;
}

/**
 * Expand ~ and resolve a path from an option or environment variable
 */
export function resolvePath(path: string): string {
	return resolve(path.replace(/^~/, process.env.HOME || ''));
}

/**
 * Get the decks directory from --decks or QUIZ_DECKS_DIR.
 * Exits when neither is set or the directory doesn't exist.
 */
export function requireDecksDir(args: string[]): string {
	const dir = getArg(args, '--decks') ?? process.env.QUIZ_DECKS_DIR;
	if (!dir) {
		console.error('Error: a decks directory is required');
		console.error('');
		console.error('Pass it with --decks <dir> or set it in the environment:');
		console.error('  export QUIZ_DECKS_DIR=~/flashcards/decks');
		process.exit(1);
	}

	const resolvedPath = resolvePath(dir);
	if (!existsSync(resolvedPath)) {
		console.error(`Error: Decks directory does not exist: ${resolvedPath}`);
		process.exit(1);
	}
	return resolvedPath;
}

/**
 * Get the data directory (settings and history) from --data or QUIZ_DATA_DIR
 */
export function getDataDir(args: string[]): string {
	return resolvePath(getArg(args, '--data') ?? process.env.QUIZ_DATA_DIR ?? '.quiz-data');
}

/**
 * Parse an answers list such as "0,2,-,1" into choice indexes (- or empty = unanswered)
 */
export function parseAnswers(value: string): Array<number | null> {
	return value.split(',').map((part) => {
		const trimmed = part.trim();
		if (trimmed === '' || trimmed === '-') return null;
		const index = Number(trimmed);
		if (!Number.isInteger(index)) {
			throw new Error(`Invalid answer "${trimmed}": expected a choice index or -`);
		}
		return index;
	});
}
