import { beforeEach, describe, expect, it, vi } from "vitest";

const { worker, createWorker } = vi.hoisted(() => {
  const worker = {
    recognize: vi.fn(),
    terminate: vi.fn(async () => undefined),
  };
  return { worker, createWorker: vi.fn(async () => worker) };
});

vi.mock("tesseract.js", () => ({ createWorker }));

import {
  NO_TEXT_MESSAGE,
  bundledLangPath,
  imageParser,
  resolveLangPath,
} from "../src/lib/parsers/image";
import { makeContext } from "./helpers";

describe("imageParser", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("keeps the image and structures the recognized text", async () => {
    worker.recognize.mockResolvedValue({
      data: { text: "# Memo\nCall the supplier\n\n- milk\n- eggs\n" },
    });

    const doc = await imageParser.parse("/scans/note.png", Buffer.from("png"), makeContext());

    expect(createWorker).toHaveBeenCalledWith("eng", undefined, {
      langPath: bundledLangPath(),
      cacheMethod: "none",
    });
    expect(worker.terminate).toHaveBeenCalledTimes(1);
    expect(doc).toEqual({
      title: "note",
      blocks: [
        { type: "image", alt: "Original image", src: "/scans/note.png" },
        { type: "heading", level: 1, text: "Memo" },
        { type: "text", text: "Call the supplier" },
        { type: "list", items: ["milk", "eggs"], ordered: false },
      ],
    });
  });

  it("reports images without text", async () => {
    worker.recognize.mockResolvedValue({ data: { text: "  \n" } });

    const doc = await imageParser.parse(
      "/scans/blank.jpg",
      Buffer.from("jpg"),
      makeContext({ preserveImages: false }),
    );

    expect(doc.blocks).toEqual([{ type: "text", text: NO_TEXT_MESSAGE }]);
  });

  it("passes OCR settings through and terminates the worker on failure", async () => {
    worker.recognize.mockRejectedValue(new Error("bad image"));

    await expect(
      imageParser.parse(
        "/scans/x.png",
        Buffer.from("png"),
        makeContext({ ocr: { language: "deu", langPath: "/data/tessdata" } }),
      ),
    ).rejects.toThrow("bad image");

    expect(createWorker).toHaveBeenCalledWith("deu", undefined, {
      langPath: "/data/tessdata",
      cacheMethod: "none",
    });
    expect(worker.terminate).toHaveBeenCalledTimes(1);
  });

  it("refuses languages without local data before starting a worker", async () => {
    await expect(
      imageParser.parse(
        "/scans/x.png",
        Buffer.from("png"),
        makeContext({ ocr: { language: "eng+deu" } }),
      ),
    ).rejects.toThrow(
      "No OCR data bundled for deu; set ocr.langPath to a directory holding their traineddata files",
    );
    expect(createWorker).not.toHaveBeenCalled();
  });
});

describe("resolveLangPath", () => {
  it("uses the bundled English data unless a path is configured", () => {
    expect(resolveLangPath({ language: "eng" })).toBe(bundledLangPath());
    expect(resolveLangPath({ language: "fra", langPath: "/tessdata" })).toBe("/tessdata");
    expect(bundledLangPath().endsWith("4.0.0_best_int")).toBe(true);
  });
});
