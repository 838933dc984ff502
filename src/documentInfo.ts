import { DirectiveKind, DocumentInfo, IncludeDirective, IncludeDocument, RangeInfo } from './types';

export const INCLUDE_MARKER = '\\include';
export const INCLUDE_PATTERN = /\\include\s*"((?:[^"\\]|\\.)*)"/g;
export const SCHEME_LOAD_PATTERN = /\(\s*load\s+"((?:[^"\\]|\\.)*)"/g;

const MUSIC = 0;
const SCHEME = 1;
const STRING = 2;
const COMMENT = 3;

function findStringEnd(text: string, quoteIndex: number): number {
	let index = quoteIndex + 1;
	while (index < text.length) {
		const char = text.charAt(index);
		if (char === '\\') {
			index += 2;
			continue;
		}
		if (char === '"') {
			return index + 1;
		}
		index++;
	}

	return text.length;
}

function findLineEnd(text: string, index: number): number {
	const lineBreak = /[\r\n]/g;
	lineBreak.lastIndex = index;
	const match = lineBreak.exec(text);
	return match ? match.index : text.length;
}

function findClosing(text: string, index: number, marker: string): number {
	const closing = text.indexOf(marker, index);
	return closing === -1 ? text.length : closing + marker.length;
}

interface LexerFrame {
	mode: typeof MUSIC | typeof SCHEME;
	depth: number;
}

/**
 * Marks every character as music, Scheme, string or comment, so directive
 * matches can be rejected when they start inside a string or a comment.
 * Scheme code (`#(…)`, `$(…)`) and music embedded in it (`#{…#}`) nest, so
 * the lexer keeps a stack of frames; a Scheme frame counts its parentheses.
 */
function classifyText(text: string): Uint8Array {
	const modes = new Uint8Array(text.length);
	const frames: LexerFrame[] = [{ mode: MUSIC, depth: 0 }];
	let index = 0;

	while (index < text.length) {
		const frame = frames[frames.length - 1];
		const char = text.charAt(index);

		if (char === '"') {
			const end = findStringEnd(text, index);
			modes.fill(STRING, index, end);
			index = end;
			continue;
		}

		if (frame.mode === MUSIC) {
			if (text.startsWith('%{', index)) {
				const end = findClosing(text, index + 2, '%}');
				modes.fill(COMMENT, index, end);
				index = end;
				continue;
			}

			if (char === '%') {
				const end = findLineEnd(text, index);
				modes.fill(COMMENT, index, end);
				index = end;
				continue;
			}

			if ((char === '#' || char === '$') && text.charAt(index + 1) === '(') {
				modes.fill(SCHEME, index, index + 2);
				frames.push({ mode: SCHEME, depth: 1 });
				index += 2;
				continue;
			}

			if (frames.length > 1 && text.startsWith('#}', index)) {
				modes.fill(SCHEME, index, index + 2);
				frames.pop();
				index += 2;
				continue;
			}

			index++;
			continue;
		}

		if (char === ';') {
			const end = findLineEnd(text, index);
			modes.fill(COMMENT, index, end);
			index = end;
			continue;
		}

		if (text.startsWith('#|', index)) {
			const end = findClosing(text, index + 2, '|#');
			modes.fill(COMMENT, index, end);
			index = end;
			continue;
		}

		// Character literal: #\( #\) #\" #\; are plain data.
		if (text.startsWith('#\\', index)) {
			const end = Math.min(index + 3, text.length);
			modes.fill(SCHEME, index, end);
			index = end;
			continue;
		}

		if (text.startsWith('#{', index)) {
			modes.fill(SCHEME, index, index + 2);
			frames.push({ mode: MUSIC, depth: 0 });
			index += 2;
			continue;
		}

		if (char === '(') {
			frame.depth++;
		} else if (char === ')') {
			frame.depth--;
			if (frame.depth === 0) {
				frames.pop();
			}
		}
		modes[index] = SCHEME;
		index++;
	}

	return modes;
}

function unescapeFilename(raw: string): string {
	return raw.replace(/\\(["\\])/g, '$1');
}

function collectDirectives(text: string, pattern: RegExp, kind: DirectiveKind, expectedMode: number, modes: Uint8Array, results: IncludeDirective[]): void {
	pattern.lastIndex = 0;
	let match: RegExpExecArray | null;
	while ((match = pattern.exec(text)) !== null) {
		if (modes[match.index] !== expectedMode) {
			continue;
		}

		const filenameEnd = match.index + match[0].length - 1;
		results.push({
			kind,
			filename: unescapeFilename(match[1]),
			start: match.index,
			filenameStart: filenameEnd - match[1].length,
			filenameEnd
		});
	}
}

export function findIncludeDirectives(text: string): IncludeDirective[] {
	const modes = classifyText(text);
	const directives: IncludeDirective[] = [];
	collectDirectives(text, INCLUDE_PATTERN, 'include', MUSIC, modes, directives);
	collectDirectives(text, SCHEME_LOAD_PATTERN, 'schemeLoad', SCHEME, modes, directives);
	return directives.sort((left, right) => left.start - right.start);
}

function argumentsOf(directives: readonly IncludeDirective[], kind: DirectiveKind): string[] {
	return directives.filter(directive => directive.kind === kind).map(directive => directive.filename);
}

export function createDocumentInfo(document: IncludeDocument, includePath: readonly string[]): DocumentInfo {
	const directives = findIncludeDirectives(document.getText());

	return {
		range(start: number, end: number): RangeInfo {
			// The filename's closing quote must fall inside the range too.
			const inRange = directives.filter(directive => directive.start >= start && directive.filenameEnd + 1 <= end);
			return {
				includeArgs: () => argumentsOf(inRange, 'include'),
				schemeLoadArgs: () => argumentsOf(inRange, 'schemeLoad')
			};
		},
		includePath(): string[] {
			return [...includePath];
		}
	};
}
