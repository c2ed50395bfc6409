import { stripFrontmatter } from "../lib/document.js";
import { HELP_HEIGHT } from "../lib/help.js";
import { logger } from "../lib/logger.js";
import { resolveCommand } from "../lib/shortcuts.js";
import { splitSlides } from "../lib/slides.js";
import {
  createViewport,
  editorLine,
  gotoBottom,
  gotoTop,
  halfViewDown,
  halfViewUp,
  lineDown,
  lineUp,
  pastBottom,
  resizeViewport,
  setContent,
  totalLineCount,
  viewDown,
  viewUp
} from "../lib/viewport.js";
import type {
  PagerCommand,
  PagerDocument,
  PagerEffect,
  PagerEvent,
  PagerState
} from "../types/app.js";

export const STATUS_BAR_HEIGHT = 1;
export const COPIED_MESSAGE = "Copied contents";

export interface UpdateOptions {
  presentationMode: boolean;
}

export interface PagerTransition {
  state: PagerState;
  effects: PagerEffect[];
}

export const createInitialPagerState = (): PagerState => ({
  mode: "browse",
  statusMessage: "",
  statusIsError: false,
  document: null,
  terminal: { width: 0, height: 0 },
  viewport: createViewport(),
  showHelp: false,
  slides: [],
  slideMode: false,
  currentSlide: 0,
  slideSource: null,
  resetScrollPending: false,
  loadSeq: 0,
  renderSeq: 0,
  renderedSeq: 0
});

const unchanged = (state: PagerState): PagerTransition => ({ state, effects: [] });

const withSize = (state: PagerState): PagerState => {
  const { width, height } = state.terminal;
  let viewportHeight = height - STATUS_BAR_HEIGHT;
  if (state.showHelp) {
    viewportHeight -= STATUS_BAR_HEIGHT + HELP_HEIGHT;
  }
  return {
    ...state,
    viewport: resizeViewport(state.viewport, width, Math.max(0, viewportHeight))
  };
};

const clearSlides = (state: PagerState): PagerState => ({
  ...state,
  slides: [],
  slideMode: false,
  currentSlide: 0,
  slideSource: null,
  resetScrollPending: false
});

const ensureSlides = (state: PagerState, options: UpdateOptions): PagerState => {
  const body = state.document?.body ?? "";
  if (state.slideSource === body) {
    return state;
  }

  const slides = splitSlides(body, options.presentationMode);
  if (slides.length > 0) {
    logger.info("slide mode enabled", { slides: slides.length });
  } else {
    logger.debug("no numbered headers found, slide mode disabled");
  }
  return { ...state, slides, slideMode: slides.length > 0, currentSlide: 0, slideSource: body };
};

const requestRender = (state: PagerState, text: string): PagerTransition => {
  const seq = state.renderSeq + 1;
  return {
    state: { ...state, renderSeq: seq },
    effects: [
      {
        kind: "render",
        seq,
        text,
        note: state.document?.note ?? "",
        width: state.viewport.width
      }
    ]
  };
};

const requestLoad = (state: PagerState, path: string): PagerTransition => {
  const seq = state.loadSeq + 1;
  return { state: { ...state, loadSeq: seq }, effects: [{ kind: "load", seq, path }] };
};

const currentText = (state: PagerState): string => {
  if (state.slideMode && state.slides.length > 0) {
    return state.slides[state.currentSlide];
  }
  return stripFrontmatter(state.document?.body ?? "");
};

const showStatusMessage = (
  state: PagerState,
  message: string,
  isError = false
): PagerTransition => ({
  state: { ...state, mode: "statusMessage", statusMessage: message, statusIsError: isError },
  effects: [{ kind: "startStatusTimer" }]
});

const reload = (state: PagerState): PagerTransition => {
  if (!state.document) {
    return unchanged(state);
  }
  return requestLoad(clearSlides(state), state.document.localPath);
};

const unload = (state: PagerState): PagerTransition => {
  logger.debug("unload");
  const effects: PagerEffect[] = [{ kind: "stopStatusTimer" }];
  if (state.document) {
    effects.push({ kind: "unwatch", path: state.document.localPath });
  }
  const initial = createInitialPagerState();
  // Bumping the sequences drops any load or render still in flight for the old document.
  const next = withSize({
    ...initial,
    terminal: state.terminal,
    loadSeq: state.loadSeq + 1,
    renderSeq: state.renderSeq + 1,
    renderedSeq: state.renderedSeq
  });
  return { state: next, effects };
};

const toggleHelp = (state: PagerState): PagerState => {
  const next = withSize({ ...state, showHelp: !state.showHelp });
  return pastBottom(next.viewport) ? { ...next, viewport: gotoBottom(next.viewport) } : next;
};

const navigateSlide = (
  state: PagerState,
  step: 1 | -1,
  options: UpdateOptions
): PagerTransition => {
  const derived = state.slideMode ? state : ensureSlides(state, options);
  if (!derived.slideMode || derived.slides.length === 0) {
    logger.debug("no slides found for navigation");
    return unchanged(derived);
  }

  const target = derived.currentSlide + step;
  if (target < 0 || target >= derived.slides.length) {
    logger.debug(step > 0 ? "already at last slide" : "already at first slide");
    return unchanged(derived);
  }

  logger.debug(step > 0 ? "navigating to next slide" : "navigating to previous slide", {
    slide: target + 1,
    total: derived.slides.length
  });
  return requestRender(
    { ...derived, currentSlide: target, resetScrollPending: true },
    derived.slides[target]
  );
};

const scroll = (state: PagerState, command: PagerCommand): PagerState => {
  const { viewport } = state;
  switch (command) {
    case "top":
      return { ...state, viewport: gotoTop(viewport) };
    case "bottom":
      return { ...state, viewport: gotoBottom(viewport) };
    case "halfPageDown":
      return { ...state, viewport: halfViewDown(viewport) };
    case "halfPageUp":
      return { ...state, viewport: halfViewUp(viewport) };
    case "lineDown":
      return { ...state, viewport: lineDown(viewport, 1) };
    case "lineUp":
      return { ...state, viewport: lineUp(viewport, 1) };
    case "pageDown":
      return { ...state, viewport: viewDown(viewport) };
    case "pageUp":
      return { ...state, viewport: viewUp(viewport) };
    default:
      return state;
  }
};

const openEditor = (state: PagerState, document: PagerDocument): PagerTransition => {
  const line = editorLine(state.viewport);
  logger.info("opening editor", {
    file: document.localPath,
    line: `${line}/${totalLineCount(state.viewport)}`
  });
  return { state, effects: [{ kind: "openEditor", path: document.localPath, line }] };
};

const handleKey = (state: PagerState, key: string, options: UpdateOptions): PagerTransition => {
  const command = resolveCommand(key);
  if (!command) {
    return unchanged(state);
  }

  switch (command) {
    case "back":
      if (state.mode !== "browse") {
        return unchanged({ ...state, mode: "browse" });
      }
      return { state, effects: [{ kind: "quit" }] };
    case "quit":
      return { state, effects: [{ kind: "quit" }] };
    case "edit":
      return state.document ? openEditor(state, state.document) : unchanged(state);
    case "copy": {
      if (!state.document) {
        return unchanged(state);
      }
      const shown = showStatusMessage(state, COPIED_MESSAGE);
      return {
        state: shown.state,
        effects: [{ kind: "copy", text: state.document.body }, ...shown.effects]
      };
    }
    case "reload":
      return reload(state);
    case "toggleHelp":
      return unchanged(toggleHelp(state));
    case "nextSlide":
      return navigateSlide(state, 1, options);
    case "previousSlide":
      return navigateSlide(state, -1, options);
    default:
      return unchanged(scroll(state, command));
  }
};

export const updatePager = (
  state: PagerState,
  event: PagerEvent,
  options: UpdateOptions
): PagerTransition => {
  switch (event.type) {
    case "open": {
      if (state.document && state.document.localPath !== event.path) {
        const unloaded = unload(state);
        const loading = requestLoad(unloaded.state, event.path);
        return { state: loading.state, effects: [...unloaded.effects, ...loading.effects] };
      }
      return requestLoad(clearSlides(state), event.path);
    }

    case "key":
      return handleKey(state, event.key, options);

    case "resize": {
      let next = withSize({ ...state, terminal: { width: event.width, height: event.height } });
      if (!next.document) {
        return unchanged(next);
      }
      if (next.slides.length === 0 && next.document.body !== "") {
        next = ensureSlides(next, options);
      }
      return requestRender(next, currentText(next));
    }

    case "documentLoaded": {
      if (event.seq !== state.loadSeq) {
        logger.debug("discarding stale load", { seq: event.seq, latest: state.loadSeq });
        return unchanged(state);
      }
      const next: PagerState = {
        ...clearSlides(state),
        document: event.document,
        viewport: gotoTop(state.viewport)
      };
      return requestRender(next, stripFrontmatter(event.document.body));
    }

    case "loadFailed": {
      if (event.seq !== state.loadSeq) {
        logger.debug("discarding stale load failure", { seq: event.seq, latest: state.loadSeq });
        return unchanged(state);
      }
      const shown = showStatusMessage(state, `Couldn't load document: ${event.error.message}`, true);
      if (!state.document) {
        return shown;
      }
      return {
        state: shown.state,
        effects: [...shown.effects, { kind: "watch", path: state.document.localPath }]
      };
    }

    case "contentRendered": {
      if (event.seq !== state.renderSeq) {
        logger.debug("discarding stale render", { seq: event.seq, latest: state.renderSeq });
        return unchanged(state);
      }
      logger.info("content rendered", { state: state.mode });
      let viewport = setContent(state.viewport, event.content);
      if (state.resetScrollPending) {
        viewport = gotoTop(viewport);
      }
      const next: PagerState = {
        ...state,
        viewport,
        resetScrollPending: false,
        renderedSeq: event.seq
      };
      return {
        state: next,
        effects: next.document ? [{ kind: "watch", path: next.document.localPath }] : []
      };
    }

    case "renderFailed":
      return unchanged(state);

    case "fileChanged":
    case "editorFinished":
      return reload(state);

    case "statusMessageTimeout":
      return unchanged(state.mode === "statusMessage" ? { ...state, mode: "browse" } : state);

    case "unload":
      return unload(state);
  }
};
