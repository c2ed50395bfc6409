import cliTruncate from "cli-truncate";
import { fenceLanguage, isMarkdownFile, wrapCodeBlock } from "./document.js";
import type { MarkdownEngine } from "./markdown.js";
import type { StyleConfig } from "./styles.js";

export const LINE_NUMBER_WIDTH = 4;
const LINE_NUMBER_GAP = " ";

export interface RenderRequest {
  text: string;
  note: string;
  width: number;
}

export interface RenderSettings {
  enabled: boolean;
  maxWidth: number;
  preserveNewLines: boolean;
  showLineNumbers: boolean;
  styles: StyleConfig;
}

export const formatLineNumber = (line: number): string =>
  String(line).padStart(LINE_NUMBER_WIDTH, " ");

const truncateLine = (line: string, viewportWidth: number): string => {
  const limit = viewportWidth - LINE_NUMBER_WIDTH - LINE_NUMBER_GAP.length;
  return limit > 0 ? cliTruncate(line, limit) : line;
};

export const renderContent = async (
  { text, note, width }: RenderRequest,
  settings: RenderSettings,
  engine: MarkdownEngine
): Promise<string> => {
  // Yield first so the caller's event handling finishes before any rendering work.
  await Promise.resolve();

  if (!settings.enabled) {
    return text;
  }

  const isCode = !isMarkdownFile(note);
  const wordWrap = isCode ? 0 : Math.max(0, Math.min(settings.maxWidth, width));
  const source = isCode ? wrapCodeBlock(text, fenceLanguage(note)) : text;

  let out = engine.render(source, {
    wordWrap,
    preserveNewLines: settings.preserveNewLines,
    isCode,
    theme: settings.styles.markdown
  });

  if (isCode) {
    out = out.trim();
  }

  if (!isCode && !settings.showLineNumbers) {
    return out;
  }

  const { lineNumber } = settings.styles;
  return out
    .split("\n")
    .map(
      (line, index) =>
        `${lineNumber(formatLineNumber(index + 1))}${LINE_NUMBER_GAP}${truncateLine(line, width)}`
    )
    .join("\n");
};
