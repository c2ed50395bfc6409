import { Box, Text } from "ink";
import { HELP_ROWS } from "../lib/help.js";
import type { StatusBarColors } from "../lib/styles.js";

interface HelpOverlayProps {
  open: boolean;
  width: number;
  colors: StatusBarColors;
}

export const helpLines = (width: number): string[] =>
  ["", ...HELP_ROWS].map((row) => row.padEnd(width, " "));

export default function HelpOverlay({ open, width, colors }: HelpOverlayProps) {
  if (!open) {
    return null;
  }

  return (
    <Box flexDirection="column">
      {helpLines(width).map((line, index) => (
        <Text
          key={index}
          wrap="truncate-end"
          color={colors.helpViewFg}
          backgroundColor={colors.helpViewBg}
        >
          {line === "" ? " " : line}
        </Text>
      ))}
    </Box>
  );
}
