import { readFile } from "node:fs/promises";
import { extname, isAbsolute, relative, resolve } from "node:path";
import hljs from "highlight.js";
import { PagerError, fsErrorCode } from "./errors.js";
import type { PagerDocument } from "../types/app.js";

const MARKDOWN_EXTENSIONS = [".md", ".mdown", ".mkdn", ".mkd", ".markdown"];
const FRONTMATTER_BOUNDARY = /^---\r?\n(\s*\r?\n)?/gmu;

export const isMarkdownFile = (filename: string): boolean => {
  const extension = extname(filename).toLowerCase();
  return extension === "" || MARKDOWN_EXTENSIONS.includes(extension);
};

export const fenceLanguage = (filename: string): string => {
  const language = extname(filename).slice(1).toLowerCase();
  return language && hljs.getLanguage(language) ? language : "";
};

export const wrapCodeBlock = (code: string, language: string): string => {
  const body = code.endsWith("\n") ? code : `${code}\n`;
  return `\`\`\`${language}\n${body}\`\`\``;
};

export const stripFrontmatter = (content: string): string => {
  const boundaries = Array.from(content.matchAll(FRONTMATTER_BOUNDARY)).slice(0, 2);
  if (boundaries.length < 2 || boundaries[0].index !== 0) {
    return content;
  }
  const closing = boundaries[1];
  return content.slice((closing.index ?? 0) + closing[0].length);
};

export const documentNote = (localPath: string, cwd: string): string => {
  const relativePath = relative(cwd, localPath);
  if (relativePath === "" || relativePath.startsWith("..") || isAbsolute(relativePath)) {
    return localPath;
  }
  return relativePath;
};

const decoder = new TextDecoder("utf-8", { fatal: true });

export const readDocument = async (
  path: string,
  cwd: string = process.cwd()
): Promise<PagerDocument> => {
  const localPath = resolve(cwd, path);

  let bytes: Buffer;
  try {
    bytes = await readFile(localPath);
  } catch (error) {
    const code = fsErrorCode(error) ?? "IO";
    const reason = error instanceof Error ? error.message : String(error);
    throw new PagerError(code, `could not read ${localPath}: ${reason}`);
  }

  let body: string;
  try {
    body = decoder.decode(bytes);
  } catch {
    throw new PagerError("INVALID_ENCODING", `${localPath} is not valid UTF-8`);
  }

  return {
    note: documentNote(localPath, cwd),
    localPath,
    body
  };
};
