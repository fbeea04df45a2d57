import { access, readFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { formatOptionsSchema } from "./schemas.js";
import type { FormatOptions } from "./types.js";

/** Options file picked up from the working directory when no `--config` is given */
export const CONFIG_FILENAME = ".reflinks.json";

const exists = async (path: string): Promise<boolean> => {
	try {
		await access(path);
		return true;
	} catch {
		return false;
	}
};

/** Validate raw JSON text as options; throws with every zod issue on one line */
export const parseFormatOptions = (raw: string, source: string): FormatOptions => {
	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch {
		throw new Error(`Invalid JSON in ${source}`);
	}

	const validated = formatOptionsSchema.safeParse(parsed);
	if (!validated.success) {
		const issues = validated.error.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message));
		throw new Error(`Invalid options in ${source}: ${issues.join("; ")}`);
	}
	return validated.data;
};

/**
 * Resolve options: an explicit config path must exist; otherwise `.reflinks.json`
 * in `cwd` is used when present, and the defaults when not.
 */
export const loadFormatOptions = async (configPath?: string, cwd = process.cwd()): Promise<FormatOptions> => {
	if (configPath) {
		const absPath = resolve(cwd, configPath);
		if (!(await exists(absPath))) throw new Error(`Config file not found: ${absPath}`);
		return parseFormatOptions(await readFile(absPath, "utf-8"), configPath);
	}

	const localPath = join(cwd, CONFIG_FILENAME);
	if (await exists(localPath)) {
		return parseFormatOptions(await readFile(localPath, "utf-8"), CONFIG_FILENAME);
	}
	return formatOptionsSchema.parse({});
};
