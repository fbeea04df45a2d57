import { readFile, stat, writeFile } from "node:fs/promises";
import { relative, resolve } from "node:path";
import * as p from "@clack/prompts";
import color from "picocolors";
import matter from "gray-matter";
import { errorDiagnostic, partitionDiagnostics } from "../shared/diagnostics.js";
import { reportFile } from "../shared/cli.js";
import { loadFormatOptions } from "../shared/config.js";
import { listMarkdownFiles } from "../shared/scanner.js";
import { DEFAULT_FORMAT_OPTIONS } from "../shared/schemas.js";
import type { FileReport, FormatOptions, FormatResult } from "../shared/types.js";
import { reassemble } from "./assembler.js";
import { parseScopes } from "./parser.js";
import { rewriteTree } from "./rewriter.js";

const FENCE = "---";
/** gray-matter language names parsed as YAML; its other engines evaluate code */
const YAML_LANGUAGES = new Set(["", "yaml", "yml"]);

/**
 * Split off a leading YAML front matter block, byte for byte.
 * An opening fence with no closing one is a thematic break, not front matter.
 * Front matter that is not valid YAML, or declares another language, comes
 * back as an error.
 */
export const splitFrontMatter = (text: string): { frontMatter: string; body: string } | { error: string } => {
	if (!matter.test(text) || !text.includes(`\n${FENCE}`, FENCE.length)) return { frontMatter: "", body: text };

	const language = matter.language(text).name;
	if (!YAML_LANGUAGES.has(language)) return { error: `unsupported language "${language}"` };

	let body: string;
	try {
		// passing options skips gray-matter's content cache
		body = matter(text, {}).content;
	} catch (err) {
		return { error: err instanceof Error ? err.message : String(err) };
	}

	if (!text.endsWith(body)) return { frontMatter: "", body: text };
	return { frontMatter: text.slice(0, text.length - body.length), body };
};

/**
 * Rewrite the links of one document: parse the scope tree, rewrite every
 * scope, splice the tree back together. Nothing is written anywhere.
 */
export const formatLinks = (text: string, options: FormatOptions = DEFAULT_FORMAT_OPTIONS): FormatResult => {
	const split = splitFrontMatter(text);
	if ("error" in split) {
		return {
			ok: false,
			errors: [errorDiagnostic("front-matter", `Invalid front matter: ${split.error}`, 1)],
			warnings: [],
		};
	}

	const { frontMatter, body } = split;
	if (frontMatter && !body) return { ok: true, text, changed: false, warnings: [] };

	const firstLine = 1 + (frontMatter.match(/\n/g)?.length ?? 0);
	const parsed = parseScopes(body, options, firstLine);
	if (!parsed.ok) return parsed;

	const { errors, warnings } = partitionDiagnostics([...parsed.warnings, ...rewriteTree(parsed.root, options)]);
	if (errors.length > 0) return { ok: false, errors, warnings };

	const output = frontMatter + reassemble(parsed.root);
	return { ok: true, text: output, changed: output !== text, warnings };
};

/** Read a file and format it; the file itself is left alone */
export const formatLinkFile = async (path: string, options: FormatOptions = DEFAULT_FORMAT_OPTIONS): Promise<FormatResult> =>
	formatLinks(await readFile(path, "utf-8"), options);

export interface FormatPathOptions {
	/** Overwrite files whose text changed */
	write: boolean;
	options?: FormatOptions;
}

/**
 * Format a file, or every markdown file under a directory. Each file is
 * handled on its own: a failure is reported and the batch moves on, and a
 * file is only written once its whole pipeline succeeded.
 */
export const formatPath = async (source: string, { write, options }: FormatPathOptions): Promise<FileReport[]> => {
	const info = await stat(source).catch(() => null);
	if (!info) throw new Error(`Path not found: ${source}`);

	const files = info.isDirectory() ? await listMarkdownFiles(source) : [source];
	const reports: FileReport[] = [];

	for (const path of files) {
		let text: string;
		try {
			text = await readFile(path, "utf-8");
		} catch (err) {
			const message = err instanceof Error ? err.message : String(err);
			const errors = [errorDiagnostic("unreadable-file", `Cannot read file: ${message}`)];
			reports.push({ ok: false, errors, warnings: [], path, written: false });
			continue;
		}

		const result = formatLinks(text, options);
		const shouldWrite = write && result.ok && result.changed;
		if (shouldWrite) await writeFile(path, result.text, "utf-8");
		reports.push({ ...result, path, written: shouldWrite });
	}

	return reports;
};

export interface RunFormatOptions {
	/** Report what would change without writing */
	check?: boolean;
	configPath?: string;
}

/**
 * CLI driver for `format` and `check`. Returns false when any file failed,
 * or, when checking, when any file would change.
 */
export const runFormat = async (source: string, { check = false, configPath }: RunFormatOptions = {}): Promise<boolean> => {
	const cwd = process.cwd();
	const options = await loadFormatOptions(configPath, cwd);
	const absPath = resolve(cwd, source);

	const reports = await formatPath(absPath, { write: !check, options });
	if (reports.length === 0) {
		p.log.warn(`No markdown files found in ${source}`);
		return true;
	}

	for (const report of reports) {
		reportFile({ ...report, path: relative(cwd, report.path) || report.path }, check);
	}

	const failed = reports.filter((r) => !r.ok).length;
	const changed = reports.filter((r) => r.ok && r.changed).length;
	const verb = check ? "would change" : "changed";
	const summary = `${reports.length} ${reports.length === 1 ? "file" : "files"}, ${changed} ${verb}, ${failed} failed`;

	if (failed > 0) {
		p.log.error(color.red(summary));
		return false;
	}
	if (check && changed > 0) {
		p.log.warn(color.yellow(summary));
		return false;
	}
	p.log.success(summary);
	return true;
};
