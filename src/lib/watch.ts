import { dirname } from "node:path";
import { FSWatcher } from "chokidar";
import { toAppError } from "./errors.js";
import { logger } from "./logger.js";
import type { AppError } from "../types/app.js";

export type WatchOperation = "create" | "write" | "remove";

export interface WatchEvent {
  path: string;
  op: WatchOperation;
}

export interface WatchSubscriber {
  event: (event: WatchEvent) => void;
  error: (error: Error) => void;
}

export interface DirectoryWatcher {
  addWatch: (dir: string) => void;
  removeWatch: (dir: string) => void;
  subscribe: (subscriber: WatchSubscriber) => () => void;
  close: () => Promise<void>;
}

export type WatchOutcome =
  | { kind: "reload" }
  | { kind: "cancelled" }
  | { kind: "failed"; error: AppError };

export const createDirectoryWatcher = (): DirectoryWatcher => {
  const watcher = new FSWatcher({
    ignoreInitial: true,
    depth: 0,
    atomic: true,
    persistent: true
  });
  const subscribers = new Set<WatchSubscriber>();

  const publish = (path: string, op: WatchOperation): void => {
    subscribers.forEach((subscriber) => subscriber.event({ path, op }));
  };

  watcher.on("add", (path) => publish(path, "create"));
  watcher.on("change", (path) => publish(path, "write"));
  watcher.on("unlink", (path) => publish(path, "remove"));
  watcher.on("error", (error) => {
    subscribers.forEach((subscriber) => subscriber.error(error));
  });

  return {
    addWatch: (dir) => {
      watcher.add(dir);
    },
    removeWatch: (dir) => {
      watcher.unwatch(dir);
    },
    subscribe: (subscriber) => {
      subscribers.add(subscriber);
      return () => {
        subscribers.delete(subscriber);
      };
    },
    close: async () => {
      subscribers.clear();
      await watcher.close();
    }
  };
};

export const watchFile = (
  watcher: DirectoryWatcher,
  path: string,
  signal: AbortSignal
): Promise<WatchOutcome> => {
  const dir = dirname(path);

  try {
    watcher.addWatch(dir);
  } catch (error) {
    logger.error("error adding dir to watcher", { dir, error });
    return Promise.resolve({ kind: "failed", error: toAppError(error, "WATCH") });
  }

  logger.info("watching dir", { dir });

  return new Promise<WatchOutcome>((resolve) => {
    if (signal.aborted) {
      resolve({ kind: "cancelled" });
      return;
    }

    const finish = (outcome: WatchOutcome): void => {
      unsubscribe();
      signal.removeEventListener("abort", onAbort);
      resolve(outcome);
    };

    const onAbort = (): void => finish({ kind: "cancelled" });

    const unsubscribe = watcher.subscribe({
      event: (event) => {
        if (event.path !== path) {
          return;
        }
        if (event.op !== "write" && event.op !== "create") {
          return;
        }
        logger.debug("watch event", { file: event.path, op: event.op });
        finish({ kind: "reload" });
      },
      error: (error) => {
        logger.debug("watcher error", { dir, error });
      }
    });

    signal.addEventListener("abort", onAbort, { once: true });
  });
};

export const unwatchDocument = (watcher: DirectoryWatcher, path: string): void => {
  const dir = dirname(path);
  try {
    watcher.removeWatch(dir);
    logger.debug("dir unwatched", { dir });
  } catch (error) {
    logger.error("failed to unwatch dir", { dir, error });
  }
};
