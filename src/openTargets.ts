import { filenamesAtCursor } from './fileAtCursor';
import { DocumentInfo, IncludeDocument, TextSelection } from './types';

export interface DocumentHost<THandle> {
	openFile(filePath: string): Promise<THandle>;
	focusDocument(handle: THandle): Promise<void>;
}

/**
 * Opens all targets in order and focuses the last one.
 * Resolves to true when at least one file was opened.
 */
export async function openTargets<THandle>(host: DocumentHost<THandle>, targets: readonly string[]): Promise<boolean> {
	let lastOpened: { readonly handle: THandle } | undefined;
	for (const target of targets) {
		lastOpened = { handle: await host.openFile(target) };
	}

	if (!lastOpened) {
		return false;
	}

	await host.focusDocument(lastOpened.handle);
	return true;
}

export function openFileAtCursor<THandle>(host: DocumentHost<THandle>, document: IncludeDocument, selection: TextSelection, info: DocumentInfo): Promise<boolean> {
	return openTargets(host, filenamesAtCursor(document, selection, info));
}
