import { spawn } from "node:child_process";
import { basename } from "node:path";
import { PagerError } from "./errors.js";

export interface EditorLauncher {
  open: (path: string, line: number) => Promise<void>;
}

export interface EditorProcess {
  once(event: "error", listener: (error: Error) => void): unknown;
  once(event: "exit", listener: (code: number | null) => void): unknown;
}

export type SpawnEditor = (command: string, args: string[]) => EditorProcess;

export interface EditorCommand {
  command: string;
  args: string[];
}

export interface EditorLauncherOptions {
  env?: NodeJS.ProcessEnv;
  spawnEditor?: SpawnEditor;
  beforeLaunch?: () => void;
  afterLaunch?: () => void;
}

const DEFAULT_EDITOR = "nano";
const PLUS_LINE_EDITORS = new Set(["vi", "vim", "nvim", "nano", "emacs", "micro", "kak", "joe"]);
const PATH_LINE_EDITORS = new Set(["hx", "helix"]);
const GOTO_EDITORS = new Set(["code", "codium"]);

export const editorCommand = (
  path: string,
  line: number,
  env: NodeJS.ProcessEnv = process.env
): EditorCommand => {
  const configured = (env.VISUAL ?? "").trim() || (env.EDITOR ?? "").trim() || DEFAULT_EDITOR;
  const [command = DEFAULT_EDITOR, ...args] = configured.split(/\s+/u);
  const name = basename(command);

  if (line <= 0) {
    return { command, args: [...args, path] };
  }
  if (PLUS_LINE_EDITORS.has(name)) {
    return { command, args: [...args, `+${line}`, path] };
  }
  if (PATH_LINE_EDITORS.has(name)) {
    return { command, args: [...args, `${path}:${line}`] };
  }
  if (GOTO_EDITORS.has(name)) {
    return { command, args: [...args, "--goto", `${path}:${line}`] };
  }
  return { command, args: [...args, path] };
};

const spawnInherited: SpawnEditor = (command, args) => spawn(command, args, { stdio: "inherit" });

export const createEditorLauncher = ({
  env = process.env,
  spawnEditor = spawnInherited,
  beforeLaunch,
  afterLaunch
}: EditorLauncherOptions = {}): EditorLauncher => ({
  open: async (path, line) => {
    const { command, args } = editorCommand(path, line, env);
    beforeLaunch?.();
    try {
      await new Promise<void>((resolve, reject) => {
        const child = spawnEditor(command, args);
        child.once("error", (error) => {
          reject(new PagerError("EDITOR", `could not start ${command}: ${error.message}`));
        });
        child.once("exit", (code) => {
          if (code === 0 || code === null) {
            resolve();
            return;
          }
          reject(new PagerError("EDITOR", `${command} exited with code ${code}`));
        });
      });
    } finally {
      afterLaunch?.();
    }
  }
});
