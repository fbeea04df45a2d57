import { z } from "zod";
import type { FormatOptions } from "./types.js";

/** Characters a shortcode name may use */
export const TAG_NAME_PATTERN = "[A-Za-z0-9_-]+";

const tagNameSchema = z.string().regex(new RegExp(`^${TAG_NAME_PATTERN}$`), "Tag names may only use letters, digits, _ and -");

/** Defaults: `partial` never closes, `code-block` content is literal */
export const DEFAULT_FORMAT_OPTIONS: FormatOptions = {
	oneLinerTags: ["partial"],
	ignoredTags: ["code-block"],
};

/** Options file / API options; missing keys fall back to the defaults */
export const formatOptionsSchema = z
	.object({
		oneLinerTags: z.array(tagNameSchema).default(DEFAULT_FORMAT_OPTIONS.oneLinerTags),
		ignoredTags: z.array(tagNameSchema).default(DEFAULT_FORMAT_OPTIONS.ignoredTags),
	})
	.strict();

export type FormatOptionsInput = z.input<typeof formatOptionsSchema>;

/** Merge partial options over the defaults, validating tag names */
export const resolveFormatOptions = (input: FormatOptionsInput = {}): FormatOptions => formatOptionsSchema.parse(input);
