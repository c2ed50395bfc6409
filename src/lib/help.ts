const VIEWPORT_KEYS = [
  "k/↑      up",
  "j/↓      down",
  "b/pgup   page up",
  "f/pgdn   page down",
  "u        ½ page up",
  "d        ½ page down"
];

const PAGER_KEYS = [
  "g/home  go to top",
  "G/end   go to bottom",
  "n/→     next slide",
  "p/←     previous slide",
  "c       copy contents",
  "e       edit this document",
  "r       reload this document",
  "esc     dismiss message",
  "q       quit"
];

const LEFT_COLUMN_WIDTH = 29;
const INDENT = "  ";

export const HELP_ROWS: readonly string[] = PAGER_KEYS.map((pagerKey, index) => {
  const left = VIEWPORT_KEYS[index] ?? "";
  return `${INDENT}${left.padEnd(LEFT_COLUMN_WIDTH, " ")}${pagerKey}`;
});

// The overlay draws one blank line above its rows.
export const HELP_HEIGHT = HELP_ROWS.length + 1;
