import { describe, it, expect } from "vitest";
import { findMarkers, parseScopes, splitLines } from "../parser.js";
import { DEFAULT_FORMAT_OPTIONS } from "../../shared/schemas.js";
import type { ScopeNode } from "../../shared/types.js";

const parseRoot = (text: string, firstLine?: number): ScopeNode => {
	const result = parseScopes(text, DEFAULT_FORMAT_OPTIONS, firstLine);
	if (!result.ok) throw new Error(result.errors.map((e) => e.message).join("\n"));
	return result.root;
};

describe("splitLines", () => {
	it("keeps line endings and a final unterminated line", () => {
		expect(splitLines("a\nb\r\nc")).toEqual(["a\n", "b\r\n", "c"]);
		expect(splitLines("a\n\n")).toEqual(["a\n", "\n"]);
		expect(splitLines("")).toEqual([]);
	});
});

describe("findMarkers", () => {
	it("returns open and close markers in column order", () => {
		expect(findMarkers("{{< a b >}}{{% /a %}}")).toEqual([
			{ kind: "open", name: "a", args: "b", index: 0, length: 11 },
			{ kind: "close", name: "a", args: "", index: 11, length: 10 },
		]);
	});

	it("accepts a close marker with no space before the slash", () => {
		const markers = findMarkers("{{</ tab >}}");
		expect(markers).toHaveLength(1);
		expect(markers[0]!.kind).toBe("close");
		expect(markers[0]!.name).toBe("tab");
	});

	it("keeps a quoted < inside the arguments", () => {
		const markers = findMarkers('{{< tab "MySQL < 4.0" >}}');
		expect(markers).toHaveLength(1);
		expect(markers[0]!.args).toBe('"MySQL < 4.0"');
	});
});

describe("parseScopes", () => {
	it("parses text without shortcodes into a bare root", () => {
		const root = parseRoot("This is some text");
		expect(root.name).toBe("#root");
		expect(root.children).toHaveLength(0);
		expect(root.lines).toEqual(["This is some text"]);
	});

	it("fails on an empty document", () => {
		const result = parseScopes("", DEFAULT_FORMAT_OPTIONS);
		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.errors[0]!.code).toBe("empty-document");
	});

	it("treats one-liner shortcodes as plain text", () => {
		const root = parseRoot('## Further Reading\n{{< partial name="whats-next/whats-next.html" >}}');
		expect(root.children).toHaveLength(0);
		expect(root.lines).toHaveLength(2);
	});

	it("honours a custom one-liner list", () => {
		const result = parseScopes('{{< img src="a.png" >}}\ntext\n', {
			oneLinerTags: ["img"],
			ignoredTags: [],
		});
		expect(result.ok).toBe(true);
		if (!result.ok) return;
		expect(result.root.children).toHaveLength(0);
		expect(result.warnings).toEqual([]);
	});

	it("captures a multi-line region with placeholder open and close lines in the parent", () => {
		const open = '{{% tab "A" %}}\n';
		const close = "{{% /tab %}}\n";
		const root = parseRoot(`Intro\n${open}Inside\n${close}After\n`);

		expect(root.lines).toEqual(["Intro\n", open, close, "After\n"]);
		expect(root.children).toHaveLength(1);

		const tab = root.children[0]!;
		expect(tab.name).toBe("tab");
		expect(tab.args).toBe('"A"');
		expect(tab.parent).toBe(root);
		expect(tab.lines).toEqual([open, "Inside\n", close]);
		expect(tab.lineNumbers).toEqual([2, 3, 4]);
		expect(tab.startLine).toBe(1);
		expect(tab.endLine).toBe(2);
	});

	it("narrows an inline region to the text between its markers", () => {
		const span = '{{< region id="x" >}}[a](http://a.com){{< /region >}}';
		const line = `Before ${span} after\n`;
		const root = parseRoot(line);

		const region = root.children[0]!;
		expect(region.startLine).toBe(0);
		expect(region.endLine).toBe(0);
		expect(region.start).toBe(7);
		expect(region.end).toBe(7 + span.length);
		expect(region.lines).toEqual([span]);
		expect(root.lines).toEqual([line]);
	});

	it("positions regions nested on one line relative to their own parent", () => {
		const inner = "{{< b >}}y{{< /b >}}";
		const outer = `{{< a >}}x${inner}{{< /a >}}`;
		const root = parseRoot(`P ${outer} Q\n`);

		const a = root.children[0]!;
		const b = a.children[0]!;
		expect(a.start).toBe(2);
		expect(a.lines).toEqual([outer]);
		expect(b.start).toBe(10);
		expect(a.lines[0]!.slice(b.start, b.end)).toBe(inner);
	});

	it("nests several regions opened and closed on the same line", () => {
		const line =
			'{{< programming-lang-wrapper langs="java,go" >}}{{< programming-lang lang="java" >}}{{< /programming-lang >}}{{< /programming-lang-wrapper >}}';
		const root = parseRoot(line);

		expect(root.children).toHaveLength(1);
		const wrapper = root.children[0]!;
		expect(wrapper.name).toBe("programming-lang-wrapper");
		expect(wrapper.lines).toEqual([line]);
		expect(wrapper.children).toHaveLength(1);
		expect(wrapper.children[0]!.name).toBe("programming-lang");
		expect(wrapper.children[0]!.endLine).toBe(0);
	});

	it("hands an inline region on a multi-line region's open line to that region", () => {
		const span = "{{< x >}}[b](http://b.com){{< /x >}}";
		const root = parseRoot(`${span} {{% tab %}}\nInside\n{{% /tab %}}\n`);

		expect(root.children.map((c) => c.name)).toEqual(["tab"]);
		expect(root.foreignLines).toEqual([0, 1]);
		const tab = root.children[0]!;
		const x = tab.children[0]!;
		expect(x.parent).toBe(tab);
		expect(x.startLine).toBe(0);
		expect(x.endLine).toBe(0);
		expect(tab.lines[0]!.slice(x.start, x.end)).toBe(span);
	});

	it("hands an inline region on a multi-line region's close line to that region", () => {
		const span = "{{< x >}}[b](http://b.com){{< /x >}}";
		const root = parseRoot(`{{% tab %}}\nInside\n{{% /tab %}} ${span}\n`);

		expect(root.children.map((c) => c.name)).toEqual(["tab"]);
		const tab = root.children[0]!;
		const x = tab.children[0]!;
		expect(x.startLine).toBe(2);
		expect(x.start).toBe(13);
		expect(tab.lines[2]!.slice(x.start, x.end)).toBe(span);
	});

	it("gives a line closing one region and opening the next to the closing region", () => {
		const root = parseRoot("{{% tab %}}\na\n{{% /tab %}}{{% tab %}} {{< x >}}y{{< /x >}}\nb\n{{% /tab %}}\n");

		expect(root.children.map((c) => c.name)).toEqual(["tab", "tab"]);
		const [first, second] = root.children;
		expect(first!.children.map((c) => [c.name, c.startLine])).toEqual([["x", 2]]);
		expect(first!.foreignLines).toEqual([]);
		expect(second!.children).toEqual([]);
		expect(second!.foreignLines).toEqual([0]);
		expect(root.foreignLines).toEqual([0, 1, 2]);
	});

	it("ignores a quoted < in arguments when matching regions", () => {
		const root = parseRoot(
			'\nHere is some root text\n{{< tab "MySQL < 4.0" >}}\nText here\n{{< /tab >}}\nand after\n{{< tab "foo" >}}\nStuff here\n{{</ tab >}}',
		);
		expect(root.children).toHaveLength(2);
	});

	it("parses non-ASCII arguments", () => {
		const root = parseRoot(
			'\nHere is text\n{{% tab "ドライバーのみ" %}}\nHello world\n{{% /tab %}}\n{{% tab "標準" %}}\nHello world 2\n{{% /tab %}}',
		);
		expect(root.children.map((c) => c.args)).toEqual(['"ドライバーのみ"', '"標準"']);
	});

	it("leaves an unknown self-closing shortcode open and warns about it", () => {
		const result = parseScopes(
			'\nThis\n{{< tab "blah" >}}\nStuff here\n{{</ tab >}}\nis text {{< foobar test="stuff" >}} and more\n{{< tab "durp" >}}\nStuff here\n{{</ tab >}}',
			DEFAULT_FORMAT_OPTIONS,
		);
		expect(result.ok).toBe(true);
		if (!result.ok) return;

		expect(result.root.children.map((c) => c.name)).toEqual(["tab", "foobar"]);
		const foobar = result.root.children[1]!;
		expect(foobar.endLine).toBeNull();
		expect(foobar.children).toHaveLength(1);
		expect(result.warnings).toEqual([
			{ severity: "warning", code: "unclosed-scope", message: 'Shortcode "foobar" is never closed', line: 6 },
		]);
	});

	it("ignores close markers that do not match the innermost region", () => {
		const root = parseRoot("{{< /tab >}}\ntext\n");
		expect(root.children).toHaveLength(0);
		expect(root.lines).toEqual(["{{< /tab >}}\n", "text\n"]);
	});

	it("numbers lines from the given first line", () => {
		const root = parseRoot("a\n{{< x >}}\nb\n{{< /x >}}\n", 5);
		expect(root.lineNumbers).toEqual([5, 6, 8]);
		expect(root.children[0]!.lineNumbers).toEqual([6, 7, 8]);
	});
});
