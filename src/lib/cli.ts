import { parseArgs } from "node:util";
import type { ConfigOverrides } from "./config.js";

export const USAGE = [
  "usage: pagemark [options] <file>",
  "",
  "  -s, --style <name>        auto, dark, light or notty",
  "  -w, --width <columns>     word wrap limit (0 disables wrapping)",
  "  -l, --line-numbers        show line numbers",
  "      --preserve-new-lines  keep single newlines from the source",
  "      --slides              page through numbered headers as slides",
  "  -p, --plain               show the file without rendering",
  "  -h, --help                show this help"
].join("\n");

export type CliResult =
  | { kind: "run"; path: string; overrides: ConfigOverrides }
  | { kind: "help" }
  | { kind: "error"; message: string };

const readArgs = (argv: string[]) =>
  parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      style: { type: "string", short: "s" },
      width: { type: "string", short: "w" },
      "line-numbers": { type: "boolean", short: "l" },
      "preserve-new-lines": { type: "boolean" },
      slides: { type: "boolean" },
      plain: { type: "boolean", short: "p" },
      help: { type: "boolean", short: "h" }
    }
  });

export const parseCli = (argv: string[]): CliResult => {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(argv);
  } catch (error) {
    return { kind: "error", message: error instanceof Error ? error.message : String(error) };
  }

  const { values, positionals } = parsed;
  if (values.help) {
    return { kind: "help" };
  }
  if (positionals.length !== 1) {
    return { kind: "error", message: "expected exactly one file" };
  }

  return {
    kind: "run",
    path: positionals[0],
    overrides: {
      style: values.style,
      maxWidth: values.width,
      showLineNumbers: values["line-numbers"],
      preserveNewLines: values["preserve-new-lines"],
      presentationMode: values.slides,
      renderEnabled: values.plain === undefined ? undefined : !values.plain
    }
  };
};
