import { errorDiagnostic, warningDiagnostic } from "../shared/diagnostics.js";
import { ROOT_SCOPE } from "../shared/types.js";
import type { Diagnostic, FormatOptions, ScopeNode } from "../shared/types.js";
import {
	assignIndices,
	collectInlineLinks,
	findReferences,
	inlineReferences,
	referenceInlineLinks,
	renderDefinitions,
	scanDefinitions,
	stripSeparators,
} from "./links.js";
import { isInlineScope } from "./parser.js";

/** Private-use placeholder standing in for the k-th child while its parent is rewritten */
const placeholder = (k: number): string => `\uE000${k}\uE001`;
const PLACEHOLDER_RE = /\uE000(\d+)\uE001/g;
/** Stands in for the content of a line another region owns */
const FOREIGN_LINE = "\uE002";

/** A rewritten line, and the line of `node.lines` it came from (`null` when generated) */
interface OutputLine {
	text: string;
	origin: number | null;
}

const describeScope = (node: ScopeNode): string => (node.name === ROOT_SCOPE ? "the document" : `shortcode "${node.name}"`);

const detectEol = (lines: string[]): string => (lines[0]?.endsWith("\r\n") ? "\r\n" : "\n");

const lineEnding = (line: string): string => line.match(/\r?\n$/)?.[0] ?? "";

/** Keep the links and definitions of lines owned elsewhere out of this scope */
const maskForeignLines = (node: ScopeNode, lines: string[]): string[] => {
	const foreign = new Set(node.foreignLines);
	return lines.map((line, index) => (foreign.has(index) ? FOREIGN_LINE + lineEnding(line) : line));
};

const restoreForeignLines = (node: ScopeNode, output: OutputLine[]): void => {
	for (const line of output) {
		if (line.origin === null || !line.text.startsWith(FOREIGN_LINE)) continue;
		const original = node.lines[line.origin] ?? "";
		line.text = original.slice(0, original.length - lineEnding(original).length) + line.text.slice(FOREIGN_LINE.length);
	}
};

/** Hide inline children from their parent's rewrite */
const maskInlineChildren = (node: ScopeNode): string[] => {
	const masked = [...node.lines];
	// right to left, so columns of earlier children on the same line stay valid
	for (let k = node.children.length - 1; k >= 0; k--) {
		const child = node.children[k];
		if (!child || !isInlineScope(child)) continue;
		const line = masked[child.startLine];
		if (line === undefined) continue;
		masked[child.startLine] = line.slice(0, child.start) + placeholder(k) + line.slice(child.end);
	}
	return masked;
};

/**
 * Put the original text of inline children back and record where it now sits.
 * A child whose placeholder did not survive (it sat inside a dropped definition)
 * is detached along with it.
 */
const restoreInlineChildren = (node: ScopeNode, lines: string[]): string[] => {
	const restored = new Set<number>();
	const output = lines.map((line, lineIndex) => {
		let result = "";
		let last = 0;
		for (const match of line.matchAll(PLACEHOLDER_RE)) {
			const k = parseInt(match[1] ?? "-1", 10);
			const child = node.children[k];
			const text = child?.lines[0] ?? "";
			result += line.slice(last, match.index);
			if (child && !restored.has(k)) {
				child.startLine = lineIndex;
				child.endLine = lineIndex;
				child.start = result.length;
				child.end = result.length + text.length;
				restored.add(k);
			}
			result += text;
			last = (match.index ?? 0) + match[0].length;
		}
		return result + line.slice(last);
	});

	node.children = node.children.filter((child, k) => {
		if (!isInlineScope(child) || restored.has(k)) return true;
		child.parent = null;
		return false;
	});
	return output;
};

/**
 * Replace the original definition lines with `block`, placed where the last
 * one stood. Without original definitions the block goes at the end of the
 * scope, before the close line of a closed region, or before the open line of
 * an unclosed child (whose content runs to the end of the document), after a
 * blank line.
 */
const placeDefinitionBlock = (
	node: ScopeNode,
	lines: string[],
	definitionLines: number[],
	block: string[],
): OutputLine[] => {
	const output: OutputLine[] = lines.map((text, origin) => ({ text, origin }));
	const generated = block.map((text): OutputLine => ({ text, origin: null }));
	const eol = detectEol(node.lines);

	const last = definitionLines[definitionLines.length - 1];
	if (last !== undefined) {
		const lastGenerated = generated[generated.length - 1];
		if (lastGenerated && !(lines[last] ?? "").endsWith("\n")) {
			lastGenerated.text = lastGenerated.text.slice(0, -eol.length);
		}
		const removed = new Set(definitionLines);
		const kept = output.filter((line) => line.origin === null || !removed.has(line.origin));
		kept.splice(last - (definitionLines.length - 1), 0, ...generated);
		return kept;
	}

	if (generated.length === 0) return output;

	const unclosed = node.children.find((child) => child.endLine === null);
	let insertAt = output.length;
	if (unclosed) insertAt = unclosed.startLine;
	else if (node.parent !== null && node.endLine !== null) insertAt = output.length - 1;
	const before = output[insertAt - 1];
	if (before && !before.text.endsWith("\n")) before.text += eol;
	const separator: OutputLine[] = before && before.text.trim() !== "" ? [{ text: eol, origin: null }] : [];
	output.splice(insertAt, 0, ...separator, ...generated);
	return output;
};

/** Move multi-line children onto the rewritten line numbering */
const rebaseChildren = (node: ScopeNode, output: OutputLine[]): void => {
	const moved = new Map<number, number>();
	output.forEach((line, index) => {
		if (line.origin !== null) moved.set(line.origin, index);
	});
	for (const child of node.children) {
		if (isInlineScope(child)) continue;
		child.startLine = moved.get(child.startLine) ?? child.startLine;
		if (child.endLine !== null) child.endLine = moved.get(child.endLine) ?? child.endLine;
	}
};

/**
 * Rewrite the links of one scope into `modifiedLines`.
 *
 * Only the node's own lines are read, so definitions never leak between
 * sibling regions. Returns the scope's diagnostics; on a duplicate index the
 * scope is left unmodified.
 */
export const rewriteScope = (node: ScopeNode): Diagnostic[] => {
	const masked = maskForeignLines(node, maskInlineChildren(node));
	const lineNumberOf = (lineIndex: number): number | undefined => node.lineNumbers[lineIndex];
	const scan = scanDefinitions(masked);

	if (scan.duplicates.length > 0) {
		node.modifiedLines = [...node.lines];
		return scan.duplicates.map(({ first, duplicate }) =>
			errorDiagnostic(
				"duplicate-reference",
				`Duplicate reference index in ${describeScope(node)}:\n` +
					`\t[${duplicate.index}]: ${duplicate.url} (line ${lineNumberOf(duplicate.lineIndex) ?? "?"})\n` +
					`\t[${first.index}]: ${first.url} (line ${lineNumberOf(first.lineIndex) ?? "?"})`,
				lineNumberOf(duplicate.lineIndex),
			),
		);
	}

	const orphans = findReferences(masked).filter((use) => !scan.definitions.has(use.index));
	const diagnostics = orphans.map((use) =>
		warningDiagnostic(
			"orphan-reference",
			`Reference [${use.index}] has no definition in ${describeScope(node)}`,
			lineNumberOf(use.lineIndex),
		),
	);

	let lines = masked.map((line) => inlineReferences(line, scan.definitions));

	if (isInlineScope(node)) {
		node.modifiedLines = restoreInlineChildren(node, lines.map(stripSeparators));
		return diagnostics;
	}

	const previous = new Map<string, number>();
	for (const definition of scan.definitions.values()) {
		if (!previous.has(definition.url)) previous.set(definition.url, definition.index);
	}
	const indices = assignIndices(
		collectInlineLinks(lines),
		previous,
		new Set(orphans.map((use) => use.index)),
	);
	lines = lines.map((line) => stripSeparators(referenceInlineLinks(line, indices)));

	const output = placeDefinitionBlock(node, lines, scan.lineIndexes, renderDefinitions(indices, detectEol(node.lines)));
	restoreForeignLines(node, output);
	rebaseChildren(node, output);
	node.modifiedLines = restoreInlineChildren(
		node,
		output.map((line) => line.text),
	);
	return diagnostics;
};

const copyScope = (node: ScopeNode): void => {
	node.modifiedLines = [...node.lines];
	node.children.forEach(copyScope);
};

/** Rewrite every scope of a tree; ignored regions and everything inside them are copied verbatim */
export const rewriteTree = (root: ScopeNode, options: FormatOptions): Diagnostic[] => {
	const ignored = new Set(options.ignoredTags);
	const visit = (node: ScopeNode): Diagnostic[] => {
		if (ignored.has(node.name)) {
			copyScope(node);
			return [];
		}
		const diagnostics = rewriteScope(node);
		return [...diagnostics, ...node.children.flatMap(visit)];
	};
	return visit(root);
};

