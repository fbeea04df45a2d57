import type { ScopeNode } from "../shared/types.js";

/**
 * Splice a rewritten subtree back into flat lines.
 *
 * Children are spliced last-to-first: a splice only shifts the lines after it,
 * so the recorded positions of every earlier sibling still hold when its turn comes.
 */
export const assembleScope = (node: ScopeNode): string[] => {
	const output = [...node.modifiedLines];

	for (const child of [...node.children].reverse()) {
		const childOutput = assembleScope(child);

		if (child.endLine !== null && child.startLine === child.endLine) {
			const line = output[child.startLine];
			if (line === undefined || childOutput.length === 0) continue;
			output[child.startLine] = line.slice(0, child.start) + childOutput.join("") + line.slice(child.end);
		} else {
			// an unclosed region only owns its open line in the parent
			const endLine = child.endLine ?? child.startLine;
			output.splice(child.startLine, endLine - child.startLine + 1, ...childOutput);
		}
	}

	return output;
};

export const reassemble = (root: ScopeNode): string => assembleScope(root).join("");
