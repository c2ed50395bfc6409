import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  documentNote,
  fenceLanguage,
  isMarkdownFile,
  readDocument,
  stripFrontmatter,
  wrapCodeBlock
} from "../../src/lib/document.js";
import { PagerError, toAppError } from "../../src/lib/errors.js";

describe("isMarkdownFile", () => {
  it("treats extensionless and markdown extensions as markdown", () => {
    expect(isMarkdownFile("README")).toBe(true);
    expect(isMarkdownFile("notes.md")).toBe(true);
    expect(isMarkdownFile("NOTES.MARKDOWN")).toBe(true);
    expect(isMarkdownFile("doc.mkd")).toBe(true);
  });

  it("treats everything else as code", () => {
    expect(isMarkdownFile("main.ts")).toBe(false);
    expect(isMarkdownFile("notes.txt")).toBe(false);
  });
});

describe("fenceLanguage", () => {
  it("uses the extension when the highlighter knows it", () => {
    expect(fenceLanguage("main.ts")).toBe("ts");
    expect(fenceLanguage("script.py")).toBe("py");
  });

  it("falls back to no language", () => {
    expect(fenceLanguage("data.unknownlang")).toBe("");
    expect(fenceLanguage("Makefile")).toBe("");
  });
});

describe("wrapCodeBlock", () => {
  it("fences code and closes on its own line", () => {
    expect(wrapCodeBlock("x = 1", "python")).toBe("```python\nx = 1\n```");
    expect(wrapCodeBlock("x = 1\n", "")).toBe("```\nx = 1\n```");
  });
});

describe("stripFrontmatter", () => {
  it("removes a leading front matter block", () => {
    expect(stripFrontmatter("---\ntitle: x\n---\n# Body")).toBe("# Body");
    expect(stripFrontmatter("---\ntitle: x\n---\n\n# Body")).toBe("# Body");
  });

  it("keeps content without a leading block", () => {
    expect(stripFrontmatter("intro\n---\na\n---\nb")).toBe("intro\n---\na\n---\nb");
    expect(stripFrontmatter("---\nunterminated")).toBe("---\nunterminated");
  });
});

describe("documentNote", () => {
  it("uses a path relative to the working directory", () => {
    expect(documentNote("/work/docs/a.md", "/work")).toBe("docs/a.md");
  });

  it("keeps absolute paths outside the working directory", () => {
    expect(documentNote("/other/a.md", "/work")).toBe("/other/a.md");
  });
});

describe("readDocument", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "pagemark-doc-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads a file into a document", async () => {
    await writeFile(join(dir, "note.md"), "# Hello\n");

    const document = await readDocument("note.md", dir);

    expect(document).toEqual({
      note: "note.md",
      localPath: join(dir, "note.md"),
      body: "# Hello\n"
    });
  });

  it("reports missing files", async () => {
    const error: unknown = await readDocument("missing.md", dir).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(PagerError);
    expect(toAppError(error).code).toBe("FILE_NOT_FOUND");
    expect(toAppError(error).message).toContain(`could not read ${join(dir, "missing.md")}`);
  });

  it("rejects files that are not UTF-8", async () => {
    await writeFile(join(dir, "binary.md"), Buffer.from([0x23, 0x20, 0xff, 0xfe]));

    await expect(readDocument("binary.md", dir)).rejects.toMatchObject({
      code: "INVALID_ENCODING",
      message: `${join(dir, "binary.md")} is not valid UTF-8`
    });
  });
});

describe("toAppError", () => {
  it("maps filesystem error codes", () => {
    const error = Object.assign(new Error("EACCES: permission denied"), { code: "EACCES" });

    expect(toAppError(error)).toEqual({
      code: "PERMISSION_DENIED",
      message: "EACCES: permission denied"
    });
  });

  it("uses the fallback code for other values", () => {
    expect(toAppError("boom", "RENDER")).toEqual({ code: "RENDER", message: "boom" });
    expect(toAppError({ message: "odd" }, "WATCH")).toEqual({ code: "WATCH", message: "odd" });
    expect(toAppError(undefined)).toEqual({ code: "IO", message: "Unexpected error" });
  });
});
