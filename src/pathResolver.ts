import * as fs from 'fs';
import * as path from 'path';

export function buildSearchPath(documentPath: string | undefined, includeRoots: readonly string[]): string[] {
	const searchPath = documentPath ? [path.dirname(documentPath)] : [];
	searchPath.push(...includeRoots);
	return searchPath;
}

export function joinSearchPath(directory: string, name: string): string {
	if (path.isAbsolute(name)) {
		return path.normalize(name);
	}

	return path.normalize(path.join(directory, name));
}

export function isExistingFile(candidate: string): boolean {
	if (!fs.existsSync(candidate)) {
		return false;
	}

	try {
		return !fs.statSync(candidate).isDirectory();
	} catch (error) {
		return false;
	}
}

/**
 * Resolves every name against the search path, first existing match wins.
 * With `allowMissing`, a name without a match is still returned, joined
 * against `fallbackDirectory` (by default the first search path entry).
 * Pass `''` for a document that has no directory of its own.
 */
export function resolveFilenames(
	rawNames: readonly string[],
	searchPath: readonly string[],
	allowMissing: boolean,
	fallbackDirectory: string = searchPath[0] ?? ''
): string[] {
	const filenames: string[] = [];
	for (const name of rawNames) {
		const match = findFirstMatch(name, searchPath);
		if (match) {
			filenames.push(match);
			continue;
		}

		if (allowMissing) {
			filenames.push(joinSearchPath(fallbackDirectory, name));
		}
	}

	return filenames;
}

function findFirstMatch(name: string, searchPath: readonly string[]): string | undefined {
	for (const directory of searchPath) {
		const candidate = joinSearchPath(directory, name);
		if (isExistingFile(candidate)) {
			return candidate;
		}
	}

	return undefined;
}

// Document scans keep trying after a hit, so the latest directory (and the last name) wins.
export function resolveLastMatch(rawNames: readonly string[], searchPath: readonly string[]): string | undefined {
	let match: string | undefined;
	for (const name of rawNames) {
		for (const directory of searchPath) {
			const candidate = joinSearchPath(directory, name);
			if (isExistingFile(candidate)) {
				match = candidate;
			}
		}
	}

	return match;
}

export function resolveAllMatches(rawNames: readonly string[], searchPath: readonly string[]): string[] {
	const matches: string[] = [];
	for (const name of rawNames) {
		for (const directory of searchPath) {
			const candidate = joinSearchPath(directory, name);
			if (isExistingFile(candidate)) {
				matches.push(candidate);
			}
		}
	}

	return matches;
}
