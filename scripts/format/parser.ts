import { errorDiagnostic, warningDiagnostic } from "../shared/diagnostics.js";
import { TAG_NAME_PATTERN } from "../shared/schemas.js";
import { ROOT_SCOPE } from "../shared/types.js";
import type { Diagnostic, FormatOptions, ScopeNode } from "../shared/types.js";

/**
 * Shortcode scope parser.
 *
 * Recognizes `{{< name args >}}` / `{{% name args %}}` open markers and
 * `{{< /name >}}` close markers (whitespace allowed around the slash) and nothing
 * else. Markers are handled in column order, so a line may open and close any
 * number of regions.
 */

const OPEN_MARKER_RE = new RegExp(`\\{\\{[<%]\\s*(${TAG_NAME_PATTERN})((?:\\s.*?)?)\\s*[%>]\\}\\}`, "g");
const CLOSE_MARKER_RE = new RegExp(`\\{\\{[<%]\\s*\\/\\s*(${TAG_NAME_PATTERN})((?:\\s.*?)?)\\s*[%>]\\}\\}`, "g");

export type ParseScopesResult =
	| { ok: true; root: ScopeNode; warnings: Diagnostic[] }
	| { ok: false; errors: Diagnostic[]; warnings: Diagnostic[] };

interface Marker {
	kind: "open" | "close";
	name: string;
	args: string;
	index: number;
	length: number;
}

interface ScopeFrame {
	node: ScopeNode;
	/** Index of the line being processed within `node.lines` */
	line: number;
	/** Document line index the node opened on; -1 for the root */
	openedAt: number;
}

/** Split text into lines, each keeping its `\n` (a final line may have none) */
export const splitLines = (text: string): string[] => text.match(/[^\n]*\n|[^\n]+$/g) ?? [];

export const createScope = (name: string, args = ""): ScopeNode => ({
	name,
	args,
	children: [],
	parent: null,
	lines: [],
	lineNumbers: [],
	foreignLines: [],
	modifiedLines: [],
	startLine: 0,
	endLine: null,
	start: 0,
	end: 0,
});

export const attachScope = (parent: ScopeNode, child: ScopeNode): void => {
	child.parent = parent;
	parent.children.push(child);
};

/** A region opened and closed on the same line of its parent */
export const isInlineScope = (node: ScopeNode): boolean => node.parent !== null && node.endLine === node.startLine;

/** All open and close markers on a line, left to right */
export const findMarkers = (line: string): Marker[] => {
	const markers: Marker[] = [];
	for (const match of line.matchAll(OPEN_MARKER_RE)) {
		markers.push({
			kind: "open",
			name: match[1] ?? "",
			args: (match[2] ?? "").trim(),
			index: match.index ?? 0,
			length: match[0].length,
		});
	}
	for (const match of line.matchAll(CLOSE_MARKER_RE)) {
		markers.push({
			kind: "close",
			name: match[1] ?? "",
			args: (match[2] ?? "").trim(),
			index: match.index ?? 0,
			length: match[0].length,
		});
	}
	return markers.sort((a, b) => a.index - b.index);
};

const capture = (frame: ScopeFrame, line: string, lineNumber: number): void => {
	frame.node.lines.push(line);
	frame.node.lineNumbers.push(lineNumber);
	frame.line = frame.node.lines.length - 1;
};

/**
 * Shrink an inline region to the text between its markers. Its own inline
 * children were positioned against the full line; rebase them onto the slice.
 */
const narrowInlineScope = (node: ScopeNode, line: string): void => {
	node.lines = [line.slice(node.start, node.end)];
	node.lineNumbers = node.lineNumbers.slice(0, 1);
	for (const child of node.children) {
		child.start -= node.start;
		child.end -= node.start;
	}
};

/** Multi-line children opening or closing on a line of `node`, in document order */
const coveringChildren = (node: ScopeNode, lineIndex: number): ScopeNode[] =>
	node.children.filter(
		(child) => !isInlineScope(child) && (child.startLine === lineIndex || child.endLine === lineIndex),
	);

/** Index in a child's own lines of the parent line it opens or closes on */
const lineIndexIn = (child: ScopeNode, parentLine: number): number =>
	child.startLine === parentLine ? 0 : child.lines.length - 1;

/**
 * Settle a line captured by more than one region. Reassembly keeps the copy of
 * the innermost region opening or closing on it (the earlier one where a close
 * and an open meet), so that region owns the line: every other captor marks it
 * foreign, and inline regions sitting on it move under the owner.
 */
const settleSharedLine = (outer: ScopeNode, lineIndex: number): void => {
	const captors: { node: ScopeNode; line: number }[] = [];
	const release = (node: ScopeNode, line: number): void => {
		captors.push({ node, line });
		for (const child of coveringChildren(node, line)) release(child, lineIndexIn(child, line));
	};

	let owner = outer;
	let line = lineIndex;
	for (;;) {
		const [next, ...later] = coveringChildren(owner, line);
		if (!next) break;
		captors.push({ node: owner, line });
		for (const child of later) release(child, lineIndexIn(child, line));
		line = lineIndexIn(next, line);
		owner = next;
	}

	const moved: ScopeNode[] = [];
	for (const captor of captors) {
		captor.node.foreignLines.push(captor.line);
		captor.node.children = captor.node.children.filter((child) => {
			if (!isInlineScope(child) || child.startLine !== captor.line) return true;
			moved.push(child);
			return false;
		});
	}
	if (moved.length === 0) return;

	for (const child of moved) {
		child.parent = owner;
		child.startLine = line;
		child.endLine = line;
		owner.children.push(child);
	}
	owner.children.sort((a, b) => a.startLine - b.startLine || a.start - b.start);
};

/**
 * Build the scope tree of a document.
 *
 * `firstLine` is the 1-based document line of the first line of `text`, for
 * bodies that follow front matter.
 */
export const parseScopes = (text: string, options: FormatOptions, firstLine = 1): ParseScopesResult => {
	const lines = splitLines(text);
	const oneLiners = new Set(options.oneLinerTags);
	const root = createScope(ROOT_SCOPE);
	const stack: ScopeFrame[] = [{ node: root, line: -1, openedAt: -1 }];
	const warnings: Diagnostic[] = [];

	lines.forEach((line, lineIndex) => {
		const lineNumber = firstLine + lineIndex;
		const top = stack[stack.length - 1];
		if (!top) return;
		capture(top, line, lineNumber);
		const markers = findMarkers(line);
		// lowest stack entry that captured this line
		let floor = stack.length - 1;

		for (const marker of markers) {
			const frame = stack[stack.length - 1];
			if (!frame) break;

			if (marker.kind === "open") {
				if (oneLiners.has(marker.name)) continue;
				const child = createScope(marker.name, marker.args);
				attachScope(frame.node, child);
				child.startLine = frame.line;
				child.start = marker.index;
				const childFrame: ScopeFrame = { node: child, line: -1, openedAt: lineIndex };
				capture(childFrame, line, lineNumber);
				stack.push(childFrame);
				continue;
			}

			const node = frame.node;
			const parentFrame = stack[stack.length - 2];
			if (marker.name !== node.name || !parentFrame) continue;

			node.end = marker.index + marker.length;
			if (frame.openedAt === lineIndex) {
				node.endLine = node.startLine;
				narrowInlineScope(node, line);
			} else {
				node.endLine = node.startLine + 1;
				capture(parentFrame, line, lineNumber);
			}
			stack.pop();
			floor = Math.min(floor, stack.length - 1);
		}

		const outer = stack[floor];
		if (markers.length > 0 && outer) settleSharedLine(outer.node, outer.line);
	});

	if (root.lines.length === 0) {
		return { ok: false, errors: [errorDiagnostic("empty-document", "Document has no lines")], warnings };
	}

	for (const frame of stack.slice(1)) {
		warnings.push(
			warningDiagnostic(
				"unclosed-scope",
				`Shortcode "${frame.node.name}" is never closed`,
				frame.node.lineNumbers[0],
			),
		);
	}

	return { ok: true, root, warnings };
};
