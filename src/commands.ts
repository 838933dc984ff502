import * as vscode from 'vscode';
import { documentFromEditor, documentInfoFor, EditorDocumentHost, selectionToOffsets } from './editorDocument';
import { DocumentHost, openFileAtCursor } from './openTargets';

export const OPEN_FILE_AT_CURSOR_COMMAND = 'lilypondIncludes.openFileAtCursor';

export type CommandLog = Pick<vscode.LogOutputChannel, 'info' | 'error'>;

export function registerIncludeCommands(context: vscode.ExtensionContext, log: CommandLog): void {
	const host = new EditorDocumentHost();
	context.subscriptions.push(
		vscode.commands.registerCommand(OPEN_FILE_AT_CURSOR_COMMAND, () => runOpenFileAtCursor(host, log))
	);
}

export async function runOpenFileAtCursor<THandle>(host: DocumentHost<THandle>, log: CommandLog): Promise<boolean> {
	const editor = vscode.window.activeTextEditor;
	if (!editor) {
		return false;
	}

	const document = documentFromEditor(editor.document);
	const selection = selectionToOffsets(editor.document, editor.selection);
	try {
		const opened = await openFileAtCursor(host, document, selection, documentInfoFor(document, editor.document.uri));
		if (!opened) {
			log.info(`No include file found at cursor in ${editor.document.uri.toString()}`);
			void vscode.window.showInformationMessage('No include file found at the cursor.');
		}
		return opened;
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		log.error(`Opening include file failed: ${message}`);
		void vscode.window.showErrorMessage(`Could not open include file: ${message}`);
		return false;
	}
}
