import * as vscode from 'vscode';
import { getConfig } from './config';
import { INCLUDE_MARKER } from './documentInfo';
import { documentFromEditor, documentInfoFor } from './editorDocument';
import { scanIncludeTooltips } from './includeTooltips';
import { IncludeTooltip } from './types';

export class IncludeHoverProvider implements vscode.HoverProvider {
	async provideHover(document: vscode.TextDocument, position: vscode.Position, token: vscode.CancellationToken): Promise<vscode.Hover | undefined> {
		if (token.isCancellationRequested) {
			return undefined;
		}

		if (!getConfig(document.uri).hoverEnabled) {
			return undefined;
		}

		const fullText = document.getText();
		if (!fullText.includes(INCLUDE_MARKER)) {
			return undefined;
		}

		const includeDocument = documentFromEditor(document);
		const tooltips = scanIncludeTooltips(includeDocument, documentInfoFor(includeDocument, document.uri));
		const tooltip = tooltips.find(entry => entry.blockNumber === position.line);
		if (!tooltip) {
			return undefined;
		}

		const block = includeDocument.blockAt(tooltip.blockNumber);
		const range = new vscode.Range(
			new vscode.Position(block.blockNumber, 0),
			new vscode.Position(block.blockNumber, block.text.length)
		);
		const contents = new vscode.MarkdownString(buildHoverLines(tooltip).join('\n\n'));
		return new vscode.Hover(contents, range);
	}
}

export function buildHoverLines(tooltip: IncludeTooltip): string[] {
	const lines: string[] = ['**Include**'];
	if (tooltip.valid) {
		lines.push(`\`${tooltip.content.replace(/\\/g, '/')}\``);
		return lines;
	}

	lines.push(`Status: ${tooltip.content}.`);
	return lines;
}
