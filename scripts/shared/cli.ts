import * as p from "@clack/prompts";
import color from "picocolors";
import type { Diagnostic, FileReport } from "./types.js";

/** Ask for the file or directory to format */
export const askSource = async (): Promise<string> => {
	const source = await p.text({
		message: "File or directory to format",
		placeholder: "content/en/",
		validate: (value) => (value.trim() ? undefined : "A path is required"),
	});

	if (p.isCancel(source)) {
		p.cancel("Operation cancelled.");
		process.exit(0);
	}

	return source.trim();
};

const diagnosticLine = (path: string, diagnostic: Diagnostic): string =>
	diagnostic.line === undefined ? `${path}  ${diagnostic.message}` : `${path}:${diagnostic.line}  ${diagnostic.message}`;

/** Log one file's outcome and its diagnostics */
export const reportFile = (report: FileReport, check: boolean): void => {
	for (const warning of report.warnings) {
		p.log.warn(color.yellow(diagnosticLine(report.path, warning)));
	}

	if (!report.ok) {
		for (const error of report.errors) {
			p.log.error(color.red(diagnosticLine(report.path, error)));
		}
		p.log.error(`${report.path} ${color.red("not written")}`);
		return;
	}

	if (!report.changed) return;
	p.log.info(check ? `${report.path} ${color.yellow("would change")}` : `${report.path} ${color.green("formatted")}`);
};

