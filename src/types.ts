export interface DocumentBlock {
	readonly blockNumber: number;
	readonly position: number;
	readonly text: string;
	/** Text length plus the line terminator; the last block counts one virtual terminator. */
	readonly length: number;
}

/**
 * Read-only view of a document, addressed by character offsets and blocks (lines).
 */
export interface IncludeDocument {
	readonly filePath?: string;
	readonly blockCount: number;
	getText(): string;
	textBetween(start: number, end: number): string;
	blockAt(blockNumber: number): DocumentBlock;
	findBlock(offset: number): DocumentBlock;
}

export interface TextSelection {
	readonly start: number;
	readonly end: number;
}

export interface RangeInfo {
	includeArgs(): string[];
	schemeLoadArgs(): string[];
}

export interface DocumentInfo {
	range(start: number, end: number): RangeInfo;
	includePath(): string[];
}

export type DirectiveKind = 'include' | 'schemeLoad';

export interface IncludeDirective {
	readonly kind: DirectiveKind;
	readonly filename: string;
	readonly start: number;
	readonly filenameStart: number;
	readonly filenameEnd: number;
}

export const INVALID_INCLUDE_MESSAGE = 'This is an invalid include file';

export type IncludeTooltip =
	| { readonly blockNumber: number; readonly valid: true; readonly content: string }
	| { readonly blockNumber: number; readonly valid: false; readonly content: typeof INVALID_INCLUDE_MESSAGE };
