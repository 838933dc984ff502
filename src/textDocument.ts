import { DocumentBlock, IncludeDocument, TextSelection } from './types';

export class PlainTextDocument implements IncludeDocument {
	readonly filePath?: string;
	private readonly text: string;
	private readonly blocks: DocumentBlock[];

	constructor(text: string, filePath?: string) {
		this.text = text;
		this.filePath = filePath;
		this.blocks = splitBlocks(text);
	}

	get blockCount(): number {
		return this.blocks.length;
	}

	getText(): string {
		return this.text;
	}

	textBetween(start: number, end: number): string {
		return this.text.slice(start, end);
	}

	blockAt(blockNumber: number): DocumentBlock {
		const block = this.blocks[blockNumber];
		if (!block) {
			throw new RangeError(`Block ${blockNumber} is outside the document (${this.blocks.length} blocks).`);
		}
		return block;
	}

	findBlock(offset: number): DocumentBlock {
		if (offset < 0 || offset > this.text.length) {
			throw new RangeError(`Offset ${offset} is outside the document (length ${this.text.length}).`);
		}

		let low = 0;
		let high = this.blocks.length - 1;
		while (low < high) {
			const middle = Math.ceil((low + high) / 2);
			if (this.blocks[middle].position <= offset) {
				low = middle;
			} else {
				high = middle - 1;
			}
		}

		return this.blocks[low];
	}
}

function splitBlocks(text: string): DocumentBlock[] {
	const blocks: DocumentBlock[] = [];
	const lineBreak = /\r\n|\r|\n/g;
	let position = 0;
	let match: RegExpExecArray | null;
	while ((match = lineBreak.exec(text)) !== null) {
		const lineText = text.slice(position, match.index);
		blocks.push({
			blockNumber: blocks.length,
			position,
			text: lineText,
			length: lineText.length + match[0].length
		});
		position = match.index + match[0].length;
	}

	const lastText = text.slice(position);
	blocks.push({ blockNumber: blocks.length, position, text: lastText, length: lastText.length + 1 });
	return blocks;
}

export function normalizeSelection(selection: TextSelection): TextSelection {
	if (selection.start <= selection.end) {
		return selection;
	}

	return { start: selection.end, end: selection.start };
}

export function hasSelection(selection: TextSelection): boolean {
	return selection.start !== selection.end;
}
