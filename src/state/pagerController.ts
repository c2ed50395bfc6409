import { resolve } from "node:path";
import { copyContents } from "../lib/clipboard.js";
import type { ClipboardTargets } from "../lib/clipboard.js";
import type { EditorLauncher } from "../lib/editor.js";
import { toAppError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { MarkdownEngine } from "../lib/markdown.js";
import { renderContent } from "../lib/render.js";
import type { RenderSettings } from "../lib/render.js";
import type { StyleConfig } from "../lib/styles.js";
import { unwatchDocument, watchFile } from "../lib/watch.js";
import type { DirectoryWatcher } from "../lib/watch.js";
import { createPagerStore } from "./pagerStore.js";
import type { PagerStoreApi } from "./pagerStore.js";
import type {
  PagerConfig,
  PagerDocument,
  PagerEffect,
  PagerEvent,
  PagerState
} from "../types/app.js";

export interface PagerServices {
  engine: MarkdownEngine;
  watcher: DirectoryWatcher;
  clipboard: ClipboardTargets;
  editor: EditorLauncher;
  readDocument: (path: string) => Promise<PagerDocument>;
}

export interface PagerControllerOptions {
  config: Readonly<PagerConfig>;
  styles: StyleConfig;
  services: PagerServices;
  onQuit?: () => void;
}

interface WatchTask {
  path: string;
  abort: AbortController;
}

export class PagerController {
  readonly store: PagerStoreApi;
  private readonly config: Readonly<PagerConfig>;
  private readonly services: PagerServices;
  private readonly renderSettings: RenderSettings;
  private readonly onQuit?: () => void;
  private readonly queue: PagerEvent[] = [];
  private readonly pending = new Set<Promise<void>>();
  private dispatching = false;
  private statusTimer: ReturnType<typeof setTimeout> | null = null;
  private watchTask: WatchTask | null = null;

  constructor({ config, styles, services, onQuit }: PagerControllerOptions) {
    this.config = config;
    this.services = services;
    this.onQuit = onQuit;
    this.store = createPagerStore({ presentationMode: config.presentationMode });
    this.renderSettings = {
      enabled: config.renderEnabled,
      maxWidth: config.maxWidth,
      preserveNewLines: config.preserveNewLines,
      showLineNumbers: config.showLineNumbers,
      styles
    };
  }

  get state(): PagerState {
    return this.store.getState().pager;
  }

  get watchedPath(): string | null {
    return this.watchTask?.path ?? null;
  }

  open(path: string): void {
    this.dispatch({ type: "open", path: resolve(path) });
  }

  resize(width: number, height: number): void {
    this.dispatch({ type: "resize", width, height });
  }

  press(key: string): void {
    this.dispatch({ type: "key", key });
  }

  dispatch(event: PagerEvent): void {
    this.queue.push(event);
    if (this.dispatching) {
      return;
    }

    this.dispatching = true;
    try {
      let next = this.queue.shift();
      while (next) {
        const effects = this.store.getState().apply(next);
        effects.forEach((effect) => this.run(effect));
        next = this.queue.shift();
      }
    } finally {
      this.dispatching = false;
    }
  }

  // Resolves once every in-flight load, render, copy and editor run has reported back.
  async settle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(Array.from(this.pending));
    }
  }

  async dispose(): Promise<void> {
    this.dispatch({ type: "unload" });
    this.stopWatch();
    this.clearStatusTimer();
    await this.settle();
    await this.services.watcher.close();
  }

  private run(effect: PagerEffect): void {
    switch (effect.kind) {
      case "load":
        this.track(this.load(effect.seq, effect.path));
        return;
      case "render":
        this.track(this.render(effect));
        return;
      case "watch":
        this.startWatch(effect.path);
        return;
      case "unwatch":
        this.stopWatch();
        unwatchDocument(this.services.watcher, effect.path);
        return;
      case "startStatusTimer":
        this.clearStatusTimer();
        this.statusTimer = setTimeout(() => {
          this.statusTimer = null;
          this.dispatch({ type: "statusMessageTimeout" });
        }, this.config.statusMessageTimeoutMs);
        return;
      case "stopStatusTimer":
        this.clearStatusTimer();
        return;
      case "copy":
        this.track(copyContents(effect.text, this.services.clipboard).then(() => undefined));
        return;
      case "openEditor":
        this.track(this.openEditor(effect.path, effect.line));
        return;
      case "quit":
        this.onQuit?.();
        return;
    }
  }

  private track(task: Promise<void>): void {
    this.pending.add(task);
    void task.then(() => {
      this.pending.delete(task);
    });
  }

  private async load(seq: number, path: string): Promise<void> {
    try {
      const document = await this.services.readDocument(path);
      this.dispatch({ type: "documentLoaded", seq, document });
    } catch (error) {
      const appError = toAppError(error, "IO");
      logger.error("error loading document", { path, code: appError.code, error: appError.message });
      this.dispatch({ type: "loadFailed", seq, error: appError });
    }
  }

  private async render(effect: Extract<PagerEffect, { kind: "render" }>): Promise<void> {
    try {
      const content = await renderContent(
        { text: effect.text, note: effect.note, width: effect.width },
        this.renderSettings,
        this.services.engine
      );
      this.dispatch({ type: "contentRendered", seq: effect.seq, content });
    } catch (error) {
      const appError = toAppError(error, "RENDER");
      logger.error("error rendering document", { seq: effect.seq, error: appError.message });
      this.dispatch({ type: "renderFailed", seq: effect.seq, error: appError });
    }
  }

  private async openEditor(path: string, line: number): Promise<void> {
    try {
      await this.services.editor.open(path, line);
    } catch (error) {
      const appError = toAppError(error, "EDITOR");
      logger.error("error running editor", { path, error: appError.message });
    }
    this.dispatch({ type: "editorFinished" });
  }

  private startWatch(path: string): void {
    if (this.watchTask?.path === path) {
      return;
    }
    if (this.watchTask) {
      const previous = this.watchTask.path;
      this.stopWatch();
      unwatchDocument(this.services.watcher, previous);
    }

    const task: WatchTask = { path, abort: new AbortController() };
    this.watchTask = task;
    void watchFile(this.services.watcher, path, task.abort.signal).then((outcome) => {
      if (this.watchTask === task) {
        this.watchTask = null;
      }
      if (outcome.kind === "reload") {
        this.dispatch({ type: "fileChanged" });
      } else if (outcome.kind === "failed") {
        logger.error("watch loop failed", { path, error: outcome.error.message });
      }
    });
  }

  private stopWatch(): void {
    if (!this.watchTask) {
      return;
    }
    this.watchTask.abort.abort();
    this.watchTask = null;
  }

  private clearStatusTimer(): void {
    if (this.statusTimer) {
      clearTimeout(this.statusTimer);
      this.statusTimer = null;
    }
  }
}
