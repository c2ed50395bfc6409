import clipboard from "clipboardy";
import { toAppError } from "./errors.js";
import { logger } from "./logger.js";

const ESC = "\u001b";
const BEL = "\u0007";

export interface TerminalSink {
  write: (chunk: string) => unknown;
}

export interface SystemClipboard {
  write: (text: string) => Promise<void>;
}

export interface ClipboardTargets {
  terminal: TerminalSink;
  system: SystemClipboard;
  env?: NodeJS.ProcessEnv;
}

export const osc52Sequence = (text: string, env: NodeJS.ProcessEnv = process.env): string => {
  const sequence = `${ESC}]52;c;${Buffer.from(text, "utf8").toString("base64")}${BEL}`;
  if (env.TMUX) {
    return `${ESC}Ptmux;${ESC}${sequence}${ESC}\\`;
  }
  if (env.TERM?.startsWith("screen")) {
    return `${ESC}P${sequence}${ESC}\\`;
  }
  return sequence;
};

export const createClipboardTargets = (terminal: TerminalSink): ClipboardTargets => ({
  terminal,
  system: { write: (text) => clipboard.write(text) }
});

export const copyContents = async (text: string, targets: ClipboardTargets): Promise<boolean> => {
  targets.terminal.write(osc52Sequence(text, targets.env));
  try {
    await targets.system.write(text);
    return true;
  } catch (error) {
    const appError = toAppError(error, "CLIPBOARD");
    logger.error("error writing to system clipboard", { error: appError.message });
    return false;
  }
};
