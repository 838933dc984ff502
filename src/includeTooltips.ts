import { INCLUDE_MARKER } from './documentInfo';
import { directiveArguments } from './fileAtCursor';
import { buildSearchPath, resolveLastMatch } from './pathResolver';
import { DocumentInfo, IncludeDocument, IncludeTooltip, INVALID_INCLUDE_MESSAGE } from './types';

/**
 * Scans the document for `\include` and builds one tooltip per block that
 * holds a recognised directive. Only the first marker of a block counts;
 * blocks whose directive yields no filename are skipped.
 */
export function scanIncludeTooltips(document: IncludeDocument, info: DocumentInfo): IncludeTooltip[] {
	const text = document.getText();
	const searchPath = buildSearchPath(document.filePath, info.includePath());
	const tooltips: IncludeTooltip[] = [];

	let markerIndex = text.indexOf(INCLUDE_MARKER, 0);
	while (markerIndex !== -1) {
		const block = document.findBlock(markerIndex);
		const head = block.position;
		const tail = head + block.length;
		markerIndex = text.indexOf(INCLUDE_MARKER, tail);

		const names = directiveArguments(info.range(head, tail));
		if (!names.length) {
			continue;
		}

		const match = resolveLastMatch(names, searchPath);
		tooltips.push(match
			? { blockNumber: block.blockNumber, valid: true, content: match }
			: { blockNumber: block.blockNumber, valid: false, content: INVALID_INCLUDE_MESSAGE });
	}

	return tooltips;
}
