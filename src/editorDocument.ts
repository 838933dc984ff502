import * as vscode from 'vscode';
import { getConfig } from './config';
import { createDocumentInfo } from './documentInfo';
import { DocumentHost } from './openTargets';
import { PlainTextDocument } from './textDocument';
import { DocumentInfo, IncludeDocument, TextSelection } from './types';

export function documentFromEditor(document: vscode.TextDocument): PlainTextDocument {
	const filePath = document.uri.scheme === 'file' ? document.uri.fsPath : undefined;
	return new PlainTextDocument(document.getText(), filePath);
}

export function documentInfoFor(document: IncludeDocument, uri: vscode.Uri): DocumentInfo {
	return createDocumentInfo(document, getConfig(uri).includePath);
}

export function selectionToOffsets(document: vscode.TextDocument, selection: vscode.Selection): TextSelection {
	return {
		start: document.offsetAt(selection.start),
		end: document.offsetAt(selection.end)
	};
}

export function toEditorPosition(document: IncludeDocument, offset: number): vscode.Position {
	const block = document.findBlock(offset);
	return new vscode.Position(block.blockNumber, offset - block.position);
}

export class EditorDocumentHost implements DocumentHost<vscode.TextDocument> {
	async openFile(filePath: string): Promise<vscode.TextDocument> {
		const document = await vscode.workspace.openTextDocument(vscode.Uri.file(filePath));
		await vscode.window.showTextDocument(document, { preview: false, preserveFocus: true });
		return document;
	}

	async focusDocument(document: vscode.TextDocument): Promise<void> {
		await vscode.window.showTextDocument(document, { preview: false, preserveFocus: false });
	}
}
