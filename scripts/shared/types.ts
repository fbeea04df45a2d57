/** Name carried by the synthetic root scope. `#` is outside the tag-name class, so no shortcode can collide with it. */
export const ROOT_SCOPE = "#root";

/**
 * One delimiter-bounded region of a document, or the whole document for the root.
 *
 * Line and column positions are relative to the parent's captured lines, which is
 * where the region is spliced back during reassembly.
 */
export interface ScopeNode {
	/** Shortcode name, or {@link ROOT_SCOPE} */
	name: string;
	/** Argument text after the name on the open marker, uninterpreted */
	args: string;
	children: ScopeNode[];
	/** Back reference used while parsing; `null` on the root */
	parent: ScopeNode | null;
	/** Raw captured lines with their line endings, including the open and close lines */
	lines: string[];
	/** 1-based document line of each entry in `lines` */
	lineNumbers: number[];
	/** Indices into `lines` whose text a child or sibling region owns and rewrites */
	foreignLines: number[];
	/** Output of the rewrite stage; empty until rewritten */
	modifiedLines: string[];
	/** Index into the parent's lines where the region opens */
	startLine: number;
	/** Index into the parent's lines where the region closes; `null` while unclosed */
	endLine: number | null;
	/** Column of the open marker, for inline regions */
	start: number;
	/** Column just past the close marker, for inline regions */
	end: number;
}

/** Region kinds the parser and rewriter treat specially */
export interface FormatOptions {
	/** Shortcodes that never have a close marker (e.g. `partial`) */
	oneLinerTags: string[];
	/** Shortcodes whose content, children included, is never rewritten */
	ignoredTags: string[];
}

export type DiagnosticSeverity = "error" | "warning";

export type DiagnosticCode =
	| "empty-document"
	| "front-matter"
	| "duplicate-reference"
	| "orphan-reference"
	| "unclosed-scope"
	| "unreadable-file";

/** Structured feedback from one document's pipeline */
export interface Diagnostic {
	severity: DiagnosticSeverity;
	code: DiagnosticCode;
	message: string;
	/** 1-based document line, when one applies */
	line?: number;
}

/** Outcome of formatting one document */
export type FormatResult =
	| { ok: true; text: string; changed: boolean; warnings: Diagnostic[] }
	| { ok: false; errors: Diagnostic[]; warnings: Diagnostic[] };

/** Outcome of formatting one file on disk */
export type FileReport = FormatResult & {
	path: string;
	/** Whether the file was overwritten */
	written: boolean;
};
