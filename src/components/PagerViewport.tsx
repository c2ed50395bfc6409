import { Box, Text } from "ink";
import { visibleLines } from "../lib/viewport.js";
import type { ViewportState } from "../types/app.js";

interface PagerViewportProps {
  viewport: ViewportState;
}

export default function PagerViewport({ viewport }: PagerViewportProps) {
  const lines = visibleLines(viewport);

  return (
    <Box flexDirection="column" height={viewport.height} overflow="hidden">
      {lines.map((line, index) => (
        <Text key={viewport.yOffset + index} wrap="truncate-end">
          {line === "" ? " " : line}
        </Text>
      ))}
    </Box>
  );
}
