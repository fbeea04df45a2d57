import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import { formatPath } from "../index.js";

vi.mock("node:fs/promises", async (importOriginal) => {
	const actual = await importOriginal<typeof import("node:fs/promises")>();
	return { ...actual, readFile: vi.fn(actual.readFile) };
});

describe("formatPath with an unreadable file", () => {
	const base = join(tmpdir(), "reflinks-test-read-errors");

	beforeAll(async () => {
		await rm(base, { recursive: true, force: true });
		await mkdir(base, { recursive: true });
		await writeFile(join(base, "a.md"), "[a](http://a.com)\n", "utf-8");
		await writeFile(join(base, "b.md"), "[b](http://b.com)\n", "utf-8");
	});

	afterAll(async () => {
		await rm(base, { recursive: true, force: true });
	});

	it("reports the failure and formats the remaining files", async () => {
		vi.mocked(readFile).mockRejectedValueOnce(new Error("EACCES: permission denied"));
		const reports = await formatPath(base, { write: true });

		expect(reports).toEqual([
			{
				ok: false,
				errors: [
					{ severity: "error", code: "unreadable-file", message: "Cannot read file: EACCES: permission denied" },
				],
				warnings: [],
				path: join(base, "a.md"),
				written: false,
			},
			{
				ok: true,
				text: "[b][1]\n\n[1]: http://b.com\n",
				changed: true,
				warnings: [],
				path: join(base, "b.md"),
				written: true,
			},
		]);
		expect(await readFile(join(base, "b.md"), "utf-8")).toBe("[b][1]\n\n[1]: http://b.com\n");
	});
});
