import * as vscode from 'vscode';
import { registerIncludeCommands } from './commands';
import { CONFIG_SECTION } from './config';
import { IncludeHoverProvider } from './hoverProvider';
import { IncludeLinkProvider, includeLinkProviderChangeEmitter, refreshIncludeLinks } from './linkProvider';

const SELECTOR: vscode.DocumentSelector = [
	{ language: 'lilypond', scheme: 'file' },
	{ language: 'lilypond', scheme: 'untitled' }
];

export function activate(context: vscode.ExtensionContext) {
	console.log('lilypond-include-links extension activating');

	const log = vscode.window.createOutputChannel('LilyPond Includes', { log: true });
	context.subscriptions.push(log);

	const linkProvider = new IncludeLinkProvider();
	context.subscriptions.push(vscode.languages.registerDocumentLinkProvider(SELECTOR, linkProvider));
	context.subscriptions.push(includeLinkProviderChangeEmitter);

	const hoverProvider = new IncludeHoverProvider();
	context.subscriptions.push(vscode.languages.registerHoverProvider(SELECTOR, hoverProvider));

	registerIncludeCommands(context, log);

	// Include roots feed the link targets, so links go stale when they change.
	context.subscriptions.push(
		vscode.workspace.onDidChangeConfiguration((event: vscode.ConfigurationChangeEvent) => {
			if (!event.affectsConfiguration(CONFIG_SECTION)) {
				return;
			}

			log.info('Include settings changed, refreshing document links');
			for (const editor of vscode.window.visibleTextEditors) {
				refreshIncludeLinks(editor.document.uri);
			}
		})
	);

	log.info('Include links activated');
}

export function deactivate() {
	console.log('lilypond-include-links extension deactivating');
}
