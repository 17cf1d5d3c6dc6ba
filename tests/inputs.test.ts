import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { collectInputFiles } from "../src/lib/inputs/collect";
import { walk } from "../src/lib/inputs/walker";

async function touch(root: string, rel: string, content = ""): Promise<void> {
  const target = path.join(root, rel);
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, content);
}

async function collectWalk(root: string, patterns?: string[]): Promise<string[]> {
  const files: string[] = [];
  for await (const file of walk(root, { additionalPatterns: patterns })) {
    files.push(path.relative(root, file).split(path.sep).join("/"));
  }
  return files.sort();
}

describe("inputs", () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "docmd-inputs-"));
    await touch(root, ".gitignore", "ignored.pdf\n");
    await touch(root, "a.docx");
    await touch(root, "b.txt");
    await touch(root, "skip.xyz");
    await touch(root, "node_modules/pkg/readme.md");
    await touch(root, "sub/c.md");
    await touch(root, "sub/ignored.pdf");
    await touch(root, "sub/.docmdignore", "*.tmp.md\n");
    await touch(root, "sub/draft.tmp.md");
    await touch(root, "sub/c.converted.md");
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  describe("walk", () => {
    it("honours default patterns and nested ignore files", async () => {
      expect(await collectWalk(root)).toEqual([
        ".gitignore",
        "a.docx",
        "b.txt",
        "skip.xyz",
        "sub/.docmdignore",
        "sub/c.md",
      ]);
    });

    it("applies extra patterns", async () => {
      expect(await collectWalk(root, ["*.txt", "sub/"])).toEqual([
        ".gitignore",
        "a.docx",
        "skip.xyz",
      ]);
    });
  });

  describe("collectInputFiles", () => {
    it("keeps supported files from directories and every explicit file", async () => {
      const missing = path.join(root, "missing.pdf");

      const result = await collectInputFiles([
        root,
        path.join(root, "skip.xyz"),
        path.join(root, "a.docx"),
        missing,
      ]);

      expect(result.files).toEqual([
        path.join(root, "a.docx"),
        path.join(root, "b.txt"),
        path.join(root, "sub", "c.md"),
        path.join(root, "skip.xyz"),
      ]);
      expect(result.missing).toEqual([missing]);
    });

    it("passes ignore patterns to the directory walk", async () => {
      const result = await collectInputFiles([root], { ignore: ["*.docx"] });

      expect(result.files).toEqual([
        path.join(root, "b.txt"),
        path.join(root, "sub", "c.md"),
      ]);
    });
  });
});
