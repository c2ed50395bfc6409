import type { PagerCommand } from "../types/app.js";

export interface KeyFlags {
  upArrow: boolean;
  downArrow: boolean;
  leftArrow: boolean;
  rightArrow: boolean;
  pageUp: boolean;
  pageDown: boolean;
  escape: boolean;
  ctrl: boolean;
}

const HOME_SEQUENCES = new Set(["[H", "[1~", "OH", "\u001b[H", "\u001b[1~", "\u001bOH"]);
const END_SEQUENCES = new Set(["[F", "[4~", "OF", "\u001b[F", "\u001b[4~", "\u001bOF"]);

const COMMANDS: Record<string, PagerCommand> = {
  q: "back",
  esc: "back",
  "ctrl+c": "quit",
  home: "top",
  g: "top",
  end: "bottom",
  G: "bottom",
  d: "halfPageDown",
  "ctrl+d": "halfPageDown",
  u: "halfPageUp",
  "ctrl+u": "halfPageUp",
  j: "lineDown",
  down: "lineDown",
  k: "lineUp",
  up: "lineUp",
  f: "pageDown",
  pgdown: "pageDown",
  " ": "pageDown",
  b: "pageUp",
  pgup: "pageUp",
  e: "edit",
  c: "copy",
  r: "reload",
  "?": "toggleHelp",
  n: "nextSlide",
  right: "nextSlide",
  p: "previousSlide",
  left: "previousSlide"
};

export const toKeyName = (input: string, key: KeyFlags): string | null => {
  if (key.escape) {
    return "esc";
  }
  if (key.upArrow) {
    return "up";
  }
  if (key.downArrow) {
    return "down";
  }
  if (key.leftArrow) {
    return "left";
  }
  if (key.rightArrow) {
    return "right";
  }
  if (key.pageUp) {
    return "pgup";
  }
  if (key.pageDown) {
    return "pgdown";
  }
  if (HOME_SEQUENCES.has(input)) {
    return "home";
  }
  if (END_SEQUENCES.has(input)) {
    return "end";
  }
  if (key.ctrl && input.length === 1) {
    return `ctrl+${input.toLowerCase()}`;
  }
  return input.length > 0 ? input : null;
};

export const resolveCommand = (keyName: string): PagerCommand | null =>
  Object.hasOwn(COMMANDS, keyName) ? COMMANDS[keyName] : null;
