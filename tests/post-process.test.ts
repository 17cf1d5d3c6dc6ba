import { describe, expect, it } from "vitest";
import { applyTerminology, dropImages } from "../src/lib/convert/post-process";
import type { ContentBlock } from "../src/lib/markdown/types";

describe("applyTerminology", () => {
  const blocks: ContentBlock[] = [
    { type: "heading", level: 2, text: "ble setup" },
    { type: "text", text: "Enable ble and WIFI" },
    { type: "list", items: ["wifi", "able"], ordered: false },
    { type: "table", rows: [["ble", 3]] },
    { type: "code", code: "ble.connect()", language: "js" },
    { type: "link", text: "ble docs", url: "https://ble.example" },
    { type: "blockquote", text: "ble" },
  ];

  it("replaces whole words case-insensitively outside code", () => {
    expect(applyTerminology(blocks, { ble: "BLE", wifi: "Wi-Fi" })).toEqual([
      { type: "heading", level: 2, text: "BLE setup" },
      { type: "text", text: "Enable BLE and Wi-Fi" },
      { type: "list", items: ["Wi-Fi", "able"], ordered: false },
      { type: "table", rows: [["BLE", 3]] },
      { type: "code", code: "ble.connect()", language: "js" },
      { type: "link", text: "BLE docs", url: "https://ble.example" },
      { type: "blockquote", text: "BLE" },
    ]);
  });

  it("returns the blocks untouched without rules", () => {
    expect(applyTerminology(blocks, {})).toBe(blocks);
    expect(applyTerminology(blocks, { "": "x" })).toBe(blocks);
  });

  it("inserts canonical spellings literally", () => {
    expect(
      applyTerminology([{ type: "text", text: "price in usd" }], { usd: "$& ($1)" }),
    ).toEqual([{ type: "text", text: "price in $& ($1)" }]);
  });

  it("treats terms as literal text", () => {
    expect(
      applyTerminology([{ type: "text", text: "v1.0 and v1x0" }], { "v1.0": "V1.0" }),
    ).toEqual([{ type: "text", text: "V1.0 and v1x0" }]);
  });
});

describe("dropImages", () => {
  it("removes image blocks only", () => {
    expect(
      dropImages([
        { type: "image", alt: "a", src: "a.png" },
        { type: "text", text: "kept" },
      ]),
    ).toEqual([{ type: "text", text: "kept" }]);
  });
});
