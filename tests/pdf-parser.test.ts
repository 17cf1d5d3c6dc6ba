import { beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("pdf-parse", () => ({
  default: vi.fn(),
}));

import pdfParse from "pdf-parse";
import { pageText, pdfParser } from "../src/lib/parsers/pdf";
import { makeContext } from "./helpers";

function pdfResult(text: string, numpages: number, info: object = {}) {
  return {
    text,
    numpages,
    numrender: numpages,
    info,
    metadata: null,
    version: "default" as const,
  };
}

function textItem(str: string, y: number) {
  return { str, transform: [1, 0, 0, 1, 72, y] };
}

// Renders every page through the parser's pagerender, like pdf-parse does.
function mockPages(pages: unknown[][], info: object = {}) {
  vi.mocked(pdfParse).mockImplementation(async (_buffer, options) => {
    let text = "";
    for (const items of pages) {
      const page = { getTextContent: async () => ({ items }) };
      const rendered: unknown = await options?.pagerender?.(page);
      text += `\n\n${String(rendered)}`;
    }
    return pdfResult(text, pages.length, info);
  });
}

describe("pageText", () => {
  it("keeps items on one baseline together and breaks lines between baselines", () => {
    expect(
      pageText({
        items: [textItem("a", 10), { type: "beginMarkedContent" }, textItem("b", 10), textItem("c", 5)],
      }),
    ).toBe("ab\nc");
  });

  it("returns nothing for content without items", () => {
    expect(pageText(null)).toBe("");
    expect(pageText({})).toBe("");
  });
});

describe("pdfParser", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("adds a heading per page even when a page holds blank lines", async () => {
    mockPages(
      [
        [textItem("Page one para A", 700), textItem("", 690), textItem("Page one para B", 680)],
        [textItem("Page two", 700), textItem(" continues", 700)],
      ],
      { Title: " Annual " },
    );

    const doc = await pdfParser.parse("/x/report.pdf", Buffer.from("%PDF"), makeContext());

    expect(pdfParse).toHaveBeenCalledWith(
      expect.any(Buffer),
      expect.objectContaining({ pagerender: expect.any(Function) }),
    );
    expect(doc).toEqual({
      title: "Annual",
      blocks: [
        { type: "heading", level: 2, text: "Page 1" },
        { type: "text", text: "Page one para A" },
        { type: "text", text: "Page one para B" },
        { type: "heading", level: 2, text: "Page 2" },
        { type: "text", text: "Page two continues" },
      ],
    });
  });

  it("omits page headings when disabled", async () => {
    mockPages([[textItem("One", 1)], [textItem("Two", 1)]]);

    const doc = await pdfParser.parse(
      "/x/report.pdf",
      Buffer.from("%PDF"),
      makeContext({ pageHeadings: false }),
    );

    expect(doc.blocks).toEqual([
      { type: "text", text: "One" },
      { type: "text", text: "Two" },
    ]);
  });

  it("falls back to the joined text and the file name", async () => {
    vi.mocked(pdfParse).mockResolvedValue(pdfResult("\n\nA\n\nB", 1));

    const doc = await pdfParser.parse("/x/scan.pdf", Buffer.from("%PDF"), makeContext());

    expect(doc).toEqual({
      title: "scan",
      blocks: [
        { type: "text", text: "A" },
        { type: "text", text: "B" },
      ],
    });
  });
});
