import { Chalk } from "chalk";
import type { ChalkInstance } from "chalk";
import type { ResolvedStyleName, StyleName } from "../types/app.js";

export interface MarkdownTheme {
  heading: ChalkInstance;
  firstHeading: ChalkInstance;
  code: ChalkInstance;
  codespan: ChalkInstance;
  blockquote: ChalkInstance;
  html: ChalkInstance;
  hr: ChalkInstance;
  listitem: ChalkInstance;
  paragraph: ChalkInstance;
  table: ChalkInstance;
  strong: ChalkInstance;
  em: ChalkInstance;
  del: ChalkInstance;
  link: ChalkInstance;
  href: ChalkInstance;
}

export interface StatusBarColors {
  logoFg?: string;
  logoBg?: string;
  noteFg?: string;
  barBg?: string;
  scrollFg?: string;
  helpFg?: string;
  helpBg?: string;
  messageFg?: string;
  messageBg?: string;
  messageHelpFg?: string;
  messageHelpBg?: string;
  errorFg?: string;
  errorBg?: string;
  helpViewFg?: string;
  helpViewBg?: string;
}

export interface StyleConfig {
  readonly name: ResolvedStyleName;
  readonly markdown: Readonly<MarkdownTheme>;
  readonly lineNumber: (text: string) => string;
  readonly statusBar: Readonly<StatusBarColors>;
}

const STATUS_BAR_DARK: StatusBarColors = {
  logoFg: "#ECFD65",
  logoBg: "#6F3FF5",
  noteFg: "#7D7D7D",
  barBg: "#242424",
  scrollFg: "#5A5A5A",
  helpFg: "#7D7D7D",
  helpBg: "#323232",
  messageFg: "#89F0CB",
  messageBg: "#1C8760",
  messageHelpFg: "#B6FFE4",
  messageHelpBg: "#04B575",
  errorFg: "#FFE3E3",
  errorBg: "#A4343A",
  helpViewFg: "#7D7D7D",
  helpViewBg: "#1B1B1B"
};

const STATUS_BAR_LIGHT: StatusBarColors = {
  ...STATUS_BAR_DARK,
  noteFg: "#656565",
  barBg: "#E6E6E6",
  scrollFg: "#949494",
  helpFg: "#656565",
  helpBg: "#DCDCDC",
  helpViewFg: "#656565",
  helpViewBg: "#F2F2F2"
};

const markdownTheme = (chalk: ChalkInstance, name: ResolvedStyleName): MarkdownTheme => {
  const accent = name === "light" ? chalk.hex("#5A56E0") : chalk.hex("#00AFFF");
  const muted = name === "light" ? chalk.hex("#656565") : chalk.hex("#7D7D7D");
  return {
    heading: accent.bold,
    firstHeading: accent.bold.underline,
    code: name === "light" ? chalk.hex("#A0522D") : chalk.hex("#E5C07B"),
    codespan: name === "light" ? chalk.hex("#D7005F") : chalk.hex("#FF5F87"),
    blockquote: muted.italic,
    html: muted,
    hr: muted,
    listitem: chalk.reset,
    paragraph: chalk.reset,
    table: chalk.reset,
    strong: chalk.bold,
    em: chalk.italic,
    del: chalk.dim.strikethrough,
    link: accent,
    href: accent.underline
  };
};

// COLORFGBG is "fg;bg" (sometimes "fg;default;bg"); 7 and 15 are light backgrounds.
export const resolveStyleName = (
  name: StyleName,
  env: NodeJS.ProcessEnv = process.env
): ResolvedStyleName => {
  if (name !== "auto") {
    return name;
  }
  const background = env.COLORFGBG?.split(";").pop()?.trim();
  return background === "7" || background === "15" ? "light" : "dark";
};

export const createStyleConfig = (
  name: StyleName,
  env: NodeJS.ProcessEnv = process.env
): StyleConfig => {
  const resolved = resolveStyleName(name, env);
  if (resolved === "notty") {
    const plain = new Chalk({ level: 0 });
    return Object.freeze({
      name: resolved,
      markdown: Object.freeze(markdownTheme(plain, resolved)),
      lineNumber: (text: string) => text,
      statusBar: Object.freeze({})
    });
  }

  const chalk = new Chalk();
  const lineNumber = resolved === "light" ? chalk.hex("#656565") : chalk.hex("#7D7D7D");
  return Object.freeze({
    name: resolved,
    markdown: Object.freeze(markdownTheme(chalk, resolved)),
    lineNumber: (text: string) => lineNumber(text),
    statusBar: Object.freeze(resolved === "light" ? { ...STATUS_BAR_LIGHT } : { ...STATUS_BAR_DARK })
  });
};
