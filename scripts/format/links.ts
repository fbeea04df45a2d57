/**
 * Reference-link primitives shared by the scope rewriter.
 * Every pattern here is line-local: none of them can match across a line break.
 */

/** `[3]: https://example.com` at the start of a line */
const DEFINITION_RE = /^[ \t]*\[(\d+)\]:[ \t]+(\S+)/;

/** The `][3]` tail of a `[text][3]` reference */
const REFERENCE_RE = /\]\[(\d+)\]/g;

/**
 * `[text](url)`: text may hold one level of brackets (an image inside a link),
 * the url one level of parentheses; in-page `#` and query-only `?` targets are skipped.
 */
const INLINE_LINK_RE = /\[((?:[^[\]\n]|\[[^[\]\n]*\])*)\]\((?![#?])((?:[^\s()]|\([^\s()]*\))+)\)/g;

/** File/group/record separators, NEL, line and paragraph separators */
const SEPARATOR_RE = /[\u001c-\u001e\u0085\u2028\u2029]/g;

export interface Definition {
	index: number;
	url: string;
	/** Position of the definition among the scanned lines */
	lineIndex: number;
}

export interface DuplicateDefinition {
	first: Definition;
	duplicate: Definition;
}

export interface DefinitionScan {
	/** First definition of each index */
	definitions: Map<number, Definition>;
	/** Every line holding a definition, ascending */
	lineIndexes: number[];
	duplicates: DuplicateDefinition[];
}

export interface ReferenceUse {
	index: number;
	lineIndex: number;
}

export const parseDefinition = (line: string): { index: number; url: string } | null => {
	const match = DEFINITION_RE.exec(line);
	if (!match?.[1] || !match[2]) return null;
	return { index: parseInt(match[1], 10), url: match[2] };
};

export const scanDefinitions = (lines: string[]): DefinitionScan => {
	const definitions = new Map<number, Definition>();
	const lineIndexes: number[] = [];
	const duplicates: DuplicateDefinition[] = [];

	lines.forEach((line, lineIndex) => {
		const parsed = parseDefinition(line);
		if (!parsed) return;
		lineIndexes.push(lineIndex);
		const definition: Definition = { ...parsed, lineIndex };
		const first = definitions.get(parsed.index);
		if (first) {
			duplicates.push({ first, duplicate: definition });
		} else {
			definitions.set(parsed.index, definition);
		}
	});

	return { definitions, lineIndexes, duplicates };
};

/** Every `[text][N]` use, in order */
export const findReferences = (lines: string[]): ReferenceUse[] =>
	lines.flatMap((line, lineIndex) =>
		[...line.matchAll(REFERENCE_RE)].map((match) => ({ index: parseInt(match[1] ?? "0", 10), lineIndex })),
	);

/** Turn `[text][N]` into `[text](url)` wherever N is defined */
export const inlineReferences = (line: string, definitions: Map<number, Definition>): string =>
	line.replace(REFERENCE_RE, (whole, index: string) => {
		const definition = definitions.get(parseInt(index, 10));
		return definition ? `](${definition.url})` : whole;
	});

/** Distinct inline-link urls in order of first appearance */
export const collectInlineLinks = (lines: string[]): string[] => {
	const urls = new Set<string>();
	for (const line of lines) {
		for (const match of line.matchAll(INLINE_LINK_RE)) {
			if (match[2]) urls.add(match[2]);
		}
	}
	return [...urls];
};

/**
 * Number the urls of a scope.
 *
 * Urls that already had an index keep their relative order and are compacted
 * onto 1..n; new urls follow in order of appearance. Indices in `reserved`
 * (held by unresolved references) are never handed out.
 */
export const assignIndices = (
	urls: string[],
	previous: Map<string, number>,
	reserved: ReadonlySet<number> = new Set(),
): Map<string, number> => {
	const reused = urls
		.flatMap((url) => {
			const index = previous.get(url);
			return index === undefined ? [] : [{ url, index }];
		})
		.sort((a, b) => a.index - b.index)
		.map(({ url }) => url);
	const fresh = urls.filter((url) => !previous.has(url));

	const indices = new Map<string, number>();
	let next = 1;
	for (const url of [...reused, ...fresh]) {
		while (reserved.has(next)) next++;
		indices.set(url, next++);
	}
	return indices;
};

/** Turn `[text](url)` into `[text][N]` for every url with an index */
export const referenceInlineLinks = (line: string, indices: Map<string, number>): string =>
	line.replace(INLINE_LINK_RE, (whole, text: string, url: string) => {
		const index = indices.get(url);
		return index === undefined ? whole : `[${text}][${index}]`;
	});

export const stripSeparators = (line: string): string => line.replace(SEPARATOR_RE, "");

/** `[1]: url` lines in index order */
export const renderDefinitions = (indices: Map<string, number>, eol: string): string[] =>
	[...indices.entries()].sort((a, b) => a[1] - b[1]).map(([url, index]) => `[${index}]: ${url}${eol}`);
