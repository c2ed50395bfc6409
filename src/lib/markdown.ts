import { Marked } from "marked";
import { markedTerminal } from "marked-terminal";
import type { MarkdownTheme } from "./styles.js";

export interface EngineOptions {
  wordWrap: number;
  preserveNewLines: boolean;
  isCode: boolean;
  theme: Readonly<MarkdownTheme>;
}

export interface MarkdownEngine {
  render: (markdown: string, options: EngineOptions) => string;
}

const LIST_INDENT = 2;

export const createTerminalEngine = (): MarkdownEngine => ({
  render: (markdown, { wordWrap, preserveNewLines, isCode, theme }) => {
    const marked = new Marked(
      markedTerminal({
        ...theme,
        width: wordWrap > 0 ? wordWrap : 80,
        reflowText: wordWrap > 0,
        showSectionPrefix: true,
        tab: isCode ? 0 : LIST_INDENT,
        emoji: true
      })
    );

    marked.setOptions({
      gfm: true,
      breaks: preserveNewLines
    });

    return marked.parse(markdown) as string;
  }
});
