import { useEffect } from "react";
import { Box, useInput, useStdout } from "ink";
import { useStore } from "zustand";
import HelpOverlay from "./components/HelpOverlay.js";
import PagerViewport from "./components/PagerViewport.js";
import StatusBar, { slideIndicator } from "./components/StatusBar.js";
import { toKeyName } from "./lib/shortcuts.js";
import { scrollPercent } from "./lib/viewport.js";
import type { StyleConfig } from "./lib/styles.js";
import type { PagerController } from "./state/pagerController.js";
import type { PagerState } from "./types/app.js";

interface AppProps {
  controller: PagerController;
  styles: StyleConfig;
}

export const statusNote = (pager: PagerState): string => {
  if (pager.mode === "statusMessage") {
    return pager.statusMessage;
  }
  const note = pager.document?.note ?? "";
  return pager.slideMode ? `${note}${slideIndicator(pager.currentSlide, pager.slides.length)}` : note;
};

export default function App({ controller, styles }: AppProps) {
  const pager = useStore(controller.store, (state) => state.pager);
  const { stdout } = useStdout();

  useEffect(() => {
    const onResize = (): void => {
      controller.resize(stdout.columns, stdout.rows);
    };

    stdout.on("resize", onResize);
    onResize();
    return () => {
      stdout.off("resize", onResize);
    };
  }, [controller, stdout]);

  useInput((input, key) => {
    const name = toKeyName(input, key);
    if (name) {
      controller.press(name);
    }
  });

  return (
    <Box flexDirection="column" width={pager.terminal.width}>
      <PagerViewport viewport={pager.viewport} />
      <StatusBar
        width={pager.terminal.width}
        note={statusNote(pager)}
        percent={scrollPercent(pager.viewport)}
        mode={pager.mode}
        isError={pager.statusIsError}
        colors={styles.statusBar}
      />
      <HelpOverlay open={pager.showHelp} width={pager.terminal.width} colors={styles.statusBar} />
    </Box>
  );
}
