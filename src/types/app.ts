export type StyleName = "auto" | "dark" | "light" | "notty";
export type ResolvedStyleName = Exclude<StyleName, "auto">;
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type AppErrorCode =
  | "FILE_NOT_FOUND"
  | "PERMISSION_DENIED"
  | "INVALID_ENCODING"
  | "IO"
  | "RENDER"
  | "WATCH"
  | "CLIPBOARD"
  | "EDITOR";

export interface AppError {
  code: AppErrorCode;
  message: string;
}

export interface PagerDocument {
  note: string;
  localPath: string;
  body: string;
}

export interface PagerConfig {
  renderEnabled: boolean;
  style: StyleName;
  maxWidth: number;
  preserveNewLines: boolean;
  showLineNumbers: boolean;
  presentationMode: boolean;
  statusMessageTimeoutMs: number;
  logLevel: LogLevel;
  logFile: string | null;
}

export type PagerMode = "browse" | "statusMessage";

export interface ViewportState {
  width: number;
  height: number;
  yOffset: number;
  lines: string[];
}

export interface PagerState {
  mode: PagerMode;
  statusMessage: string;
  statusIsError: boolean;
  document: PagerDocument | null;
  terminal: { width: number; height: number };
  viewport: ViewportState;
  showHelp: boolean;
  slides: string[];
  slideMode: boolean;
  currentSlide: number;
  slideSource: string | null;
  resetScrollPending: boolean;
  loadSeq: number;
  renderSeq: number;
  renderedSeq: number;
}

export type PagerEvent =
  | { type: "open"; path: string }
  | { type: "key"; key: string }
  | { type: "resize"; width: number; height: number }
  | { type: "documentLoaded"; seq: number; document: PagerDocument }
  | { type: "loadFailed"; seq: number; error: AppError }
  | { type: "contentRendered"; seq: number; content: string }
  | { type: "renderFailed"; seq: number; error: AppError }
  | { type: "fileChanged" }
  | { type: "editorFinished" }
  | { type: "statusMessageTimeout" }
  | { type: "unload" };

export type PagerEffect =
  | { kind: "load"; seq: number; path: string }
  | { kind: "render"; seq: number; text: string; note: string; width: number }
  | { kind: "watch"; path: string }
  | { kind: "unwatch"; path: string }
  | { kind: "startStatusTimer" }
  | { kind: "stopStatusTimer" }
  | { kind: "copy"; text: string }
  | { kind: "openEditor"; path: string; line: number }
  | { kind: "quit" };

export type PagerCommand =
  | "back"
  | "quit"
  | "top"
  | "bottom"
  | "halfPageDown"
  | "halfPageUp"
  | "lineDown"
  | "lineUp"
  | "pageDown"
  | "pageUp"
  | "edit"
  | "copy"
  | "reload"
  | "toggleHelp"
  | "nextSlide"
  | "previousSlide";
