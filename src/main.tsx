#!/usr/bin/env node
import { render } from "ink";
import type { Instance } from "ink";
import App from "./App.js";
import { createClipboardTargets } from "./lib/clipboard.js";
import { USAGE, parseCli } from "./lib/cli.js";
import { resolveConfig } from "./lib/config.js";
import { readDocument } from "./lib/document.js";
import { createEditorLauncher } from "./lib/editor.js";
import { toAppError } from "./lib/errors.js";
import { configureLogger, logger } from "./lib/logger.js";
import { createTerminalEngine } from "./lib/markdown.js";
import { createStyleConfig } from "./lib/styles.js";
import { createDirectoryWatcher } from "./lib/watch.js";
import { PagerController } from "./state/pagerController.js";

const main = async (): Promise<void> => {
  const cli = parseCli(process.argv.slice(2));
  if (cli.kind === "help") {
    process.stdout.write(`${USAGE}\n`);
    return;
  }
  if (cli.kind === "error") {
    process.stderr.write(`pagemark: ${cli.message}\n\n${USAGE}\n`);
    process.exitCode = 2;
    return;
  }

  const config = resolveConfig(cli.overrides);
  configureLogger({ level: config.logLevel, file: config.logFile });
  const styles = createStyleConfig(config.style);

  let instance: Instance | null = null;
  let stop: () => void = () => undefined;
  const stopped = new Promise<void>((resolve) => {
    stop = resolve;
  });

  // The editor takes over the terminal, so the UI is unmounted for its lifetime.
  const mount = (): void => {
    instance = render(<App controller={controller} styles={styles} />, { exitOnCtrlC: false });
  };
  const unmount = (): void => {
    instance?.unmount();
    instance = null;
  };

  const controller = new PagerController({
    config,
    styles,
    services: {
      engine: createTerminalEngine(),
      watcher: createDirectoryWatcher(),
      clipboard: createClipboardTargets(process.stdout),
      editor: createEditorLauncher({ beforeLaunch: unmount, afterLaunch: mount }),
      readDocument: (path) => readDocument(path)
    },
    onQuit: () => stop()
  });

  logger.info("starting pager", { file: cli.path, style: styles.name });
  mount();
  controller.open(cli.path);

  await stopped;
  unmount();
  await controller.dispose();
  logger.info("exiting");
};

main().catch((error: unknown) => {
  const appError = toAppError(error);
  logger.error("fatal error", { code: appError.code, error: appError.message });
  process.stderr.write(`pagemark: ${appError.message}\n`);
  process.exitCode = 1;
});
