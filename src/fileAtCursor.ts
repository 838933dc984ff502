import * as path from 'path';
import { buildSearchPath, resolveAllMatches, resolveFilenames } from './pathResolver';
import { hasSelection, normalizeSelection } from './textDocument';
import { DocumentInfo, IncludeDocument, RangeInfo, TextSelection } from './types';

export function directiveArguments(info: RangeInfo): string[] {
	const includeArgs = info.includeArgs();
	if (includeArgs.length) {
		return includeArgs;
	}

	return info.schemeLoadArgs();
}

/**
 * Returns the raw filenames referenced at the cursor: the include arguments in
 * range, else the Scheme load arguments, else a single-line selection itself.
 */
export function referencesAtCursor(document: IncludeDocument, selection: TextSelection, info: DocumentInfo): string[] {
	const normalized = normalizeSelection(selection);
	const selected = hasSelection(normalized);
	const block = document.findBlock(normalized.start);
	const start = block.position;
	const end = selected ? normalized.end : start + block.text.length + 1;

	const names = directiveArguments(info.range(start, end));
	if (names.length || !selected) {
		return names;
	}

	const text = document.textBetween(normalized.start, normalized.end);
	if (/[\r\n]/.test(text.trim())) {
		return [];
	}

	return [text];
}

export function filenamesAtCursor(document: IncludeDocument, selection: TextSelection, info: DocumentInfo, existing = true): string[] {
	const names = referencesAtCursor(document, selection, info);
	const searchPath = buildSearchPath(document.filePath, info.includePath());
	// Missing files belong beside the document, never inside an include root.
	const documentDirectory = document.filePath ? path.dirname(document.filePath) : '';
	return resolveFilenames(names, searchPath, !existing, documentDirectory);
}

// Every existing match in the caret's block, across all search path entries.
export function includeTargets(document: IncludeDocument, offset: number, info: DocumentInfo): string[] {
	const block = document.findBlock(offset);
	const names = directiveArguments(info.range(block.position, block.position + block.text.length + 1));
	if (!names.length) {
		return [];
	}

	const searchPath = buildSearchPath(document.filePath, info.includePath());
	return resolveAllMatches(names, searchPath);
}
