// Typed reader for the lilypondIncludes.* settings namespace.

import * as vscode from 'vscode';

export const CONFIG_SECTION = 'lilypondIncludes';

export interface IncludeLinksConfig {
	readonly includePath: string[];
	readonly hoverEnabled: boolean;
	readonly linksEnabled: boolean;
}

export function getConfig(scope?: vscode.Uri): IncludeLinksConfig {
	const config = vscode.workspace.getConfiguration(CONFIG_SECTION, scope);
	const includePath = config.get<string[]>('includePath', []);
	return {
		includePath: includePath.filter(entry => typeof entry === 'string' && entry.length > 0),
		hoverEnabled: config.get<boolean>('hover.enable', true),
		linksEnabled: config.get<boolean>('links.enable', true)
	};
}
