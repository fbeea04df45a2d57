import { readdir } from "node:fs/promises";
import { join } from "node:path";

/**
 * Recursively list markdown documents under a directory, sorted by path.
 * Skips dot-prefixed entries and node_modules.
 */
export const listMarkdownFiles = async (dir: string): Promise<string[]> => {
	const files: string[] = [];
	const entries = await readdir(dir, { withFileTypes: true });

	for (const entry of entries) {
		if (entry.name.startsWith(".") || entry.name === "node_modules") continue;
		const fullPath = join(dir, entry.name);

		if (entry.isDirectory()) {
			files.push(...(await listMarkdownFiles(fullPath)));
		} else if (entry.isFile() && entry.name.endsWith(".md")) {
			files.push(fullPath);
		}
	}

	return files.sort();
};
