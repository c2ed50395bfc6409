import { describe, expect, it } from "vitest";
import {
  COPIED_MESSAGE,
  createInitialPagerState,
  updatePager
} from "../../src/state/pagerUpdate.js";
import type { UpdateOptions } from "../../src/state/pagerUpdate.js";
import type { PagerDocument, PagerEffect, PagerEvent, PagerState } from "../../src/types/app.js";

const browse: UpdateOptions = { presentationMode: false };
const slides: UpdateOptions = { presentationMode: true };

const doc = (body: string, localPath = "/docs/a.md"): PagerDocument => ({
  note: localPath.split("/").pop() ?? localPath,
  localPath,
  body
});

const lines = (count: number): string =>
  Array.from({ length: count }, (_, index) => `line ${index + 1}`).join("\n");

const run = (events: PagerEvent[], options: UpdateOptions = browse, start = createInitialPagerState()) => {
  let state: PagerState = start;
  let effects: PagerEffect[] = [];
  for (const event of events) {
    const transition = updatePager(state, event, options);
    state = transition.state;
    effects = transition.effects;
  }
  return { state, effects };
};

// An 80x24 terminal showing a 50 line document.
const loaded = (body = "# Hi", options: UpdateOptions = browse) =>
  run(
    [
      { type: "resize", width: 80, height: 24 },
      { type: "open", path: "/docs/a.md" },
      { type: "documentLoaded", seq: 1, document: doc(body) },
      { type: "contentRendered", seq: 1, content: lines(50) }
    ],
    options
  ).state;

const press = (state: PagerState, key: string, options: UpdateOptions = browse) =>
  updatePager(state, { type: "key", key }, options);

describe("loading", () => {
  it("sizes the viewport below the status bar before a document exists", () => {
    const { state, effects } = run([{ type: "resize", width: 80, height: 24 }]);

    expect(state.viewport.width).toBe(80);
    expect(state.viewport.height).toBe(23);
    expect(effects).toEqual([]);
  });

  it("requests a load when a path is opened", () => {
    const { effects } = run([{ type: "open", path: "/docs/a.md" }]);

    expect(effects).toEqual([{ kind: "load", seq: 1, path: "/docs/a.md" }]);
  });

  it("renders the loaded body without front matter", () => {
    const { state, effects } = run([
      { type: "resize", width: 80, height: 24 },
      { type: "open", path: "/docs/a.md" },
      { type: "documentLoaded", seq: 1, document: doc("---\ntitle: x\n---\n# Hi") }
    ]);

    expect(state.renderSeq).toBe(1);
    expect(effects).toEqual([{ kind: "render", seq: 1, text: "# Hi", note: "a.md", width: 80 }]);
  });

  it("applies the latest render and starts watching", () => {
    const { state, effects } = run([
      { type: "resize", width: 80, height: 24 },
      { type: "open", path: "/docs/a.md" },
      { type: "documentLoaded", seq: 1, document: doc("# Hi") },
      { type: "contentRendered", seq: 1, content: lines(50) }
    ]);

    expect(state.viewport.lines).toHaveLength(50);
    expect(state.renderedSeq).toBe(1);
    expect(effects).toEqual([{ kind: "watch", path: "/docs/a.md" }]);
  });

  it("discards renders that are no longer the latest", () => {
    const state = loaded();
    const resized = updatePager(state, { type: "resize", width: 60, height: 24 }, browse).state;

    const stale = updatePager(resized, { type: "contentRendered", seq: 1, content: "old" }, browse);

    expect(resized.renderSeq).toBe(2);
    expect(stale.state).toBe(resized);
    expect(stale.effects).toEqual([]);
  });

  it("keeps content when a render fails", () => {
    const state = loaded();
    const failed = updatePager(
      state,
      { type: "renderFailed", seq: 1, error: { code: "RENDER", message: "bad" } },
      browse
    );

    expect(failed.state).toBe(state);
  });

  it("shows load errors and keeps watching the current document", () => {
    const { state, effects } = run(
      [{ type: "loadFailed", seq: 1, error: { code: "FILE_NOT_FOUND", message: "gone" } }],
      browse,
      loaded()
    );

    expect(state.mode).toBe("statusMessage");
    expect(state.statusIsError).toBe(true);
    expect(state.statusMessage).toBe("Couldn't load document: gone");
    expect(effects).toEqual([{ kind: "startStatusTimer" }, { kind: "watch", path: "/docs/a.md" }]);
  });

  it("shows load errors without a document", () => {
    const { effects } = run([
      { type: "open", path: "/docs/a.md" },
      { type: "loadFailed", seq: 1, error: { code: "IO", message: "nope" } }
    ]);

    expect(effects).toEqual([{ kind: "startStatusTimer" }]);
  });

  it("reloads after file changes and editor runs", () => {
    const state = loaded();

    expect(updatePager(state, { type: "fileChanged" }, browse).effects).toEqual([
      { kind: "load", seq: 2, path: "/docs/a.md" }
    ]);
    expect(updatePager(state, { type: "editorFinished" }, browse).effects).toEqual([
      { kind: "load", seq: 2, path: "/docs/a.md" }
    ]);
    expect(press(state, "r").effects).toEqual([{ kind: "load", seq: 2, path: "/docs/a.md" }]);
  });

  it("unloads the previous document when another one is opened", () => {
    const state = loaded();
    const { state: next, effects } = updatePager(state, { type: "open", path: "/other/b.md" }, browse);

    expect(effects).toEqual([
      { kind: "stopStatusTimer" },
      { kind: "unwatch", path: "/docs/a.md" },
      { kind: "load", seq: 3, path: "/other/b.md" }
    ]);
    expect(next.document).toBeNull();
    expect(next.loadSeq).toBe(3);
    expect(next.renderSeq).toBe(2);
    expect(next.viewport.height).toBe(23);
  });
});

describe("stale loads", () => {
  it("ignores a reload that finishes after another document was opened", () => {
    const reloading = updatePager(loaded(), { type: "fileChanged" }, browse).state;
    const opened = updatePager(reloading, { type: "open", path: "/other/b.md" }, browse).state;

    const late = updatePager(
      opened,
      { type: "documentLoaded", seq: 2, document: doc("# Old") },
      browse
    );
    expect(late.state).toBe(opened);
    expect(late.effects).toEqual([]);

    const current = updatePager(
      opened,
      { type: "documentLoaded", seq: opened.loadSeq, document: doc("# Bee", "/other/b.md") },
      browse
    );
    expect(current.state.document?.localPath).toBe("/other/b.md");
  });

  it("ignores loads and failures that finish after unload", () => {
    const reloading = updatePager(loaded(), { type: "fileChanged" }, browse).state;
    const unloaded = updatePager(reloading, { type: "unload" }, browse).state;

    const loadedLate = updatePager(
      unloaded,
      { type: "documentLoaded", seq: 2, document: doc("# Hi") },
      browse
    );
    const failedLate = updatePager(
      unloaded,
      { type: "loadFailed", seq: 2, error: { code: "IO", message: "gone" } },
      browse
    );

    expect(loadedLate.state).toBe(unloaded);
    expect(loadedLate.effects).toEqual([]);
    expect(failedLate.state).toBe(unloaded);
    expect(failedLate.effects).toEqual([]);
  });
});

describe("keys", () => {
  it("scrolls the viewport", () => {
    const state = loaded();

    expect(press(state, "j").state.viewport.yOffset).toBe(1);
    expect(press(state, "d").state.viewport.yOffset).toBe(11);
    expect(press(state, " ").state.viewport.yOffset).toBe(23);
    expect(press(state, "G").state.viewport.yOffset).toBe(27);
    expect(press(press(state, "G").state, "g").state.viewport.yOffset).toBe(0);
  });

  it("quits from browse mode and dismisses messages first", () => {
    const state = loaded();

    expect(press(state, "q").effects).toEqual([{ kind: "quit" }]);

    const copied = press(state, "c");
    expect(copied.state.mode).toBe("statusMessage");
    const dismissed = press(copied.state, "esc");
    expect(dismissed.state.mode).toBe("browse");
    expect(dismissed.effects).toEqual([]);
  });

  it("always quits on ctrl+c", () => {
    const copied = press(loaded(), "c").state;

    expect(press(copied, "ctrl+c").effects).toEqual([{ kind: "quit" }]);
  });

  it("copies the raw body and confirms right away", () => {
    const body = "---\ntitle: x\n---\n# Hi";
    const { state, effects } = press(loaded(body), "c");

    expect(state.statusMessage).toBe(COPIED_MESSAGE);
    expect(state.statusIsError).toBe(false);
    expect(effects).toEqual([{ kind: "copy", text: body }, { kind: "startStatusTimer" }]);
  });

  it("returns to browse mode when the message times out", () => {
    const copied = press(loaded(), "c").state;

    expect(updatePager(copied, { type: "statusMessageTimeout" }, browse).state.mode).toBe("browse");
  });

  it("opens the editor at the scrolled line", () => {
    const state = loaded();

    expect(press(state, "e").effects).toEqual([{ kind: "openEditor", path: "/docs/a.md", line: 0 }]);
    expect(press(press(state, "G").state, "e").effects).toEqual([
      { kind: "openEditor", path: "/docs/a.md", line: 50 }
    ]);
  });

  it("ignores document keys without a document", () => {
    const state = createInitialPagerState();

    expect(press(state, "e").effects).toEqual([]);
    expect(press(state, "c").effects).toEqual([]);
    expect(press(state, "r").effects).toEqual([]);
  });

  it("shrinks the viewport for help and pins it to the bottom when closing", () => {
    const bottom = press(loaded(), "G").state;
    const withHelp = press(bottom, "?").state;

    expect(withHelp.showHelp).toBe(true);
    expect(withHelp.viewport.height).toBe(12);
    expect(withHelp.viewport.yOffset).toBe(27);

    const scrolled = press(withHelp, "G").state;
    expect(scrolled.viewport.yOffset).toBe(38);

    const closed = press(scrolled, "?").state;
    expect(closed.viewport.height).toBe(23);
    expect(closed.viewport.yOffset).toBe(27);
  });
});

describe("slides", () => {
  const deck = "Intro\n# 1 One\nfirst\n# 2 Two\nsecond";

  it("derives slides on first navigation and moves forward", () => {
    const { state, effects } = press(loaded(deck, slides), "n", slides);

    expect(state.slides).toEqual(["# 1 One\nfirst", "# 2 Two\nsecond"]);
    expect(state.slideMode).toBe(true);
    expect(state.currentSlide).toBe(1);
    expect(state.resetScrollPending).toBe(true);
    expect(effects).toEqual([
      { kind: "render", seq: 2, text: "# 2 Two\nsecond", note: "a.md", width: 80 }
    ]);
  });

  it("stops at both ends", () => {
    const second = press(loaded(deck, slides), "n", slides).state;

    expect(press(second, "n", slides).effects).toEqual([]);
    const first = press(second, "p", slides);
    expect(first.state.currentSlide).toBe(0);
    expect(press(first.state, "p", slides).effects).toEqual([]);
  });

  it("resets the scroll once the slide renders", () => {
    const scrolled = press(loaded(deck, slides), "G", slides).state;
    const next = press(scrolled, "n", slides).state;
    const rendered = updatePager(
      next,
      { type: "contentRendered", seq: next.renderSeq, content: lines(50) },
      slides
    ).state;

    expect(rendered.viewport.yOffset).toBe(0);
    expect(rendered.resetScrollPending).toBe(false);
  });

  it("renders the current slide on resize", () => {
    const state = loaded(deck, slides);
    const { effects } = updatePager(state, { type: "resize", width: 100, height: 30 }, slides);

    expect(effects).toEqual([
      { kind: "render", seq: 2, text: "# 1 One\nfirst", note: "a.md", width: 100 }
    ]);
  });

  it("does nothing without numbered headers or presentation mode", () => {
    expect(press(loaded(deck, browse), "n").effects).toEqual([]);
    expect(press(loaded("# Title\ntext", slides), "n", slides).effects).toEqual([]);
  });

  it("clears slides on reload", () => {
    const second = press(loaded(deck, slides), "n", slides).state;
    const reloaded = press(second, "r", slides).state;

    expect(reloaded.slides).toEqual([]);
    expect(reloaded.slideMode).toBe(false);
    expect(reloaded.currentSlide).toBe(0);
  });
});

describe("unload", () => {
  it("stops the timer, unwatches and keeps the terminal size", () => {
    const { state, effects } = run([{ type: "unload" }], browse, loaded());

    expect(effects).toEqual([{ kind: "stopStatusTimer" }, { kind: "unwatch", path: "/docs/a.md" }]);
    expect(state.document).toBeNull();
    expect(state.terminal).toEqual({ width: 80, height: 24 });
    expect(state.viewport.lines).toEqual([""]);
  });
});
