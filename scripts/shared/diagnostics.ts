import type { Diagnostic, DiagnosticCode } from "./types.js";

export const errorDiagnostic = (code: DiagnosticCode, message: string, line?: number): Diagnostic =>
	line === undefined ? { severity: "error", code, message } : { severity: "error", code, message, line };

export const warningDiagnostic = (code: DiagnosticCode, message: string, line?: number): Diagnostic =>
	line === undefined ? { severity: "warning", code, message } : { severity: "warning", code, message, line };

/** Split a mixed list into errors and warnings, keeping order */
export const partitionDiagnostics = (
	diagnostics: Diagnostic[],
): { errors: Diagnostic[]; warnings: Diagnostic[] } => ({
	errors: diagnostics.filter((d) => d.severity === "error"),
	warnings: diagnostics.filter((d) => d.severity === "warning"),
});

