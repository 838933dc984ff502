import * as vscode from 'vscode';
import { getConfig } from './config';
import { findIncludeDirectives } from './documentInfo';
import { documentFromEditor, toEditorPosition } from './editorDocument';
import { buildSearchPath, resolveFilenames } from './pathResolver';

export const includeLinkProviderChangeEmitter = new vscode.EventEmitter<vscode.Uri>();

export function refreshIncludeLinks(uri: vscode.Uri): void {
	includeLinkProviderChangeEmitter.fire(uri);
}

export class IncludeLinkProvider implements vscode.DocumentLinkProvider {
	readonly onDidChange?: vscode.Event<vscode.Uri> = includeLinkProviderChangeEmitter.event;

	async provideDocumentLinks(document: vscode.TextDocument, token: vscode.CancellationToken): Promise<vscode.DocumentLink[]> {
		if (token.isCancellationRequested) {
			return [];
		}

		const config = getConfig(document.uri);
		if (!config.linksEnabled) {
			return [];
		}

		const includeDocument = documentFromEditor(document);
		const directives = findIncludeDirectives(includeDocument.getText());
		if (!directives.length) {
			return [];
		}

		const searchPath = buildSearchPath(includeDocument.filePath, config.includePath);
		const links: vscode.DocumentLink[] = [];

		for (const directive of directives) {
			if (token.isCancellationRequested) {
				return links;
			}

			const [target] = resolveFilenames([directive.filename], searchPath, false);
			if (!target) {
				continue;
			}

			const range = new vscode.Range(
				toEditorPosition(includeDocument, directive.filenameStart),
				toEditorPosition(includeDocument, directive.filenameEnd)
			);
			const documentLink = new vscode.DocumentLink(range, vscode.Uri.file(target));
			documentLink.tooltip = `Open ${target}`;
			links.push(documentLink);
		}

		return links;
	}
}
