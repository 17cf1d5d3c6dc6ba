import { describe, expect, it } from "vitest";
import { generateMarkdown } from "../src/lib/markdown/generator";
import { parseMarkdown } from "../src/lib/markdown/parser";

describe("parseMarkdown", () => {
  it("takes a leading level-1 heading as the title", () => {
    const { title, blocks } = parseMarkdown("# Title\n\n## Section\n\nSome text\n");

    expect(title).toBe("Title");
    expect(blocks).toEqual([
      { type: "heading", level: 2, text: "Section" },
      { type: "text", text: "Some text" },
    ]);
  });

  it("leaves the title empty when the document does not open with h1", () => {
    const { title, blocks } = parseMarkdown("intro\n\n# Later\n");

    expect(title).toBe("");
    expect(blocks).toEqual([
      { type: "text", text: "intro" },
      { type: "heading", level: 1, text: "Later" },
    ]);
  });

  it("strips a byte order mark and closing hashes", () => {
    const { title } = parseMarkdown("\uFEFF# Notes ##\n");
    expect(title).toBe("Notes");
  });

  it("groups consecutive list items", () => {
    const { blocks } = parseMarkdown("- a\n* b\n\n1. first\n2) second\n");

    expect(blocks).toEqual([
      { type: "list", items: ["a", "b"], ordered: false },
      { type: "list", items: ["first", "second"], ordered: true },
    ]);
  });

  it("reads fenced code verbatim", () => {
    const { blocks } = parseMarkdown("```js\nconst a = 1;\n\n# not a heading\n```\nafter\n");

    expect(blocks).toEqual([
      { type: "code", code: "const a = 1;\n\n# not a heading", language: "js" },
      { type: "text", text: "after" },
    ]);
  });

  it("runs an unclosed fence to the end of the document", () => {
    const { blocks } = parseMarkdown("~~~\nline\n");
    expect(blocks).toEqual([{ type: "code", code: "line\n", language: "" }]);
  });

  it("reads tables and unescapes pipes", () => {
    const { blocks } = parseMarkdown(
      "| Name | Note |\n| --- | :---: |\n| a | x \\| y |\n| b |  |\n\ntext\n",
    );

    expect(blocks).toEqual([
      {
        type: "table",
        rows: [
          ["Name", "Note"],
          ["a", "x | y"],
          ["b", ""],
        ],
      },
      { type: "text", text: "text" },
    ]);
  });

  it("reads blockquotes, rules, images and links", () => {
    const { blocks } = parseMarkdown(
      [
        "> quoted",
        "> more",
        "",
        "---",
        "",
        '![A \\[chart\\]](img/chart\\(1\\).png "Chart")',
        "",
        "[Docs](<https://example.com/docs>)",
      ].join("\n"),
    );

    expect(blocks).toEqual([
      { type: "blockquote", text: "quoted\nmore" },
      { type: "horizontal_rule" },
      { type: "image", alt: "A [chart]", src: "img/chart(1).png" },
      { type: "link", text: "Docs", url: "https://example.com/docs" },
    ]);
  });

  it("ends a paragraph where another block starts", () => {
    const { blocks } = parseMarkdown("line one\nline two\n- item\n");

    expect(blocks).toEqual([
      { type: "text", text: "line one\nline two" },
      { type: "list", items: ["item"], ordered: false },
    ]);
  });

  it("reads generated markdown back into the same blocks", () => {
    const doc = {
      title: "Round trip",
      blocks: [
        { type: "heading" as const, level: 2, text: "Data" },
        { type: "table" as const, rows: [["k", "v"], ["a|b", "1"]] },
        { type: "list" as const, items: ["x", "y"], ordered: true },
      ],
    };

    const parsed = parseMarkdown(generateMarkdown(doc));
    expect(parsed).toEqual(doc);
  });
});
