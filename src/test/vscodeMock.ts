// @ts-nocheck

const Module = require('module');

class Position {
	constructor(line, character) {
		this.line = line;
		this.character = character;
	}
}

class Range {
	constructor(start, end) {
		this.start = start;
		this.end = end;
	}
}

class Selection extends Range {
	constructor(anchor, active) {
		super(anchor, active);
		this.anchor = anchor;
		this.active = active;
	}
}

class Uri {
	constructor(fsPath, scheme = 'file') {
		this.scheme = scheme;
		this.fsPath = fsPath;
		this.fragment = '';
	}

	static file(fsPath) {
		return new Uri(fsPath);
	}

	static parse(value) {
		const separator = value.indexOf(':');
		return new Uri(value.slice(separator + 1), value.slice(0, separator));
	}

	toString() {
		return `${this.scheme}:${this.fsPath}`;
	}
}

class DocumentLink {
	constructor(range, target) {
		this.range = range;
		this.target = target;
		this.tooltip = undefined;
	}
}

class Disposable {
	constructor(callback = undefined) {
		this.callback = callback;
	}

	dispose() {
		if (this.callback) {
			this.callback();
			this.callback = undefined;
		}
	}
}

class EventEmitter {
	constructor() {
		this.listeners = [];
		this.event = listener => {
			this.listeners.push(listener);
			return new Disposable(() => {
				this.listeners = this.listeners.filter(entry => entry !== listener);
			});
		};
	}

	fire(data) {
		for (const listener of [...this.listeners]) {
			listener(data);
		}
	}

	dispose() {
		this.listeners = [];
	}
}

class MarkdownString {
	constructor(value = '') {
		this.value = value;
	}
}

class Hover {
	constructor(contents, range) {
		this.contents = Array.isArray(contents) ? contents : [contents];
		this.range = range;
	}
}

function createConfiguration(values) {
	return {
		get(key, defaultValue) {
			return Object.prototype.hasOwnProperty.call(values, key) ? values[key] : defaultValue;
		}
	};
}

function createOutputChannel(name) {
	return {
		name,
		lines: [],
		info(message) {
			this.lines.push(`info: ${message}`);
		},
		warn(message) {
			this.lines.push(`warn: ${message}`);
		},
		error(message) {
			this.lines.push(`error: ${message}`);
		},
		appendLine(message) {
			this.lines.push(message);
		},
		dispose() {}
	};
}

const vscodeMock = {
	Position,
	Range,
	Selection,
	Uri,
	DocumentLink,
	MarkdownString,
	Hover,
	EventEmitter,
	Disposable,
	workspace: {
		getConfiguration: () => createConfiguration({}),
		onDidChangeConfiguration: () => new Disposable(),
		openTextDocument: uri => Promise.resolve({ uri, getText: () => '' })
	},
	languages: {
		registerDocumentLinkProvider: () => new Disposable(),
		registerHoverProvider: () => new Disposable()
	},
	commands: {
		registerCommand: () => new Disposable(),
		executeCommand: () => Promise.resolve()
	},
	window: {
		activeTextEditor: undefined,
		visibleTextEditors: [],
		createOutputChannel,
		showTextDocument: document => Promise.resolve({ document }),
		showInformationMessage: () => Promise.resolve(undefined),
		showErrorMessage: () => Promise.resolve(undefined)
	}
};

const originalLoad = Module._load;

Module._load = function(request, parent, isMain) {
	if (request === 'vscode') {
		return vscodeMock;
	}

	return originalLoad.call(this, request, parent, isMain);
};

export {};
