import type { ViewportState } from "../types/app.js";

export const createViewport = (width = 0, height = 0): ViewportState => ({
  width,
  height,
  yOffset: 0,
  lines: [""]
});

export const totalLineCount = (viewport: ViewportState): number => viewport.lines.length;

export const maxYOffset = (viewport: ViewportState): number =>
  Math.max(0, viewport.lines.length - viewport.height);

export const atTop = (viewport: ViewportState): boolean => viewport.yOffset <= 0;

export const atBottom = (viewport: ViewportState): boolean =>
  viewport.yOffset >= maxYOffset(viewport);

export const pastBottom = (viewport: ViewportState): boolean =>
  viewport.yOffset > maxYOffset(viewport);

export const scrollPercent = (viewport: ViewportState): number => {
  if (viewport.height >= viewport.lines.length) {
    return 1;
  }
  const percent = viewport.yOffset / (viewport.lines.length - viewport.height);
  return Math.max(0, Math.min(1, percent));
};

export const setYOffset = (viewport: ViewportState, offset: number): ViewportState => ({
  ...viewport,
  yOffset: Math.max(0, Math.min(offset, maxYOffset(viewport)))
});

export const gotoTop = (viewport: ViewportState): ViewportState => ({ ...viewport, yOffset: 0 });

export const gotoBottom = (viewport: ViewportState): ViewportState => ({
  ...viewport,
  yOffset: maxYOffset(viewport)
});

export const setContent = (viewport: ViewportState, content: string): ViewportState => {
  const next = { ...viewport, lines: content.replace(/\r\n/gu, "\n").split("\n") };
  return next.yOffset > next.lines.length - 1 ? gotoBottom(next) : next;
};

export const resizeViewport = (
  viewport: ViewportState,
  width: number,
  height: number
): ViewportState => ({ ...viewport, width, height });

export const lineDown = (viewport: ViewportState, count: number): ViewportState => {
  if (atBottom(viewport) || count === 0 || viewport.lines.length === 0) {
    return viewport;
  }
  return setYOffset(viewport, viewport.yOffset + count);
};

export const lineUp = (viewport: ViewportState, count: number): ViewportState => {
  if (atTop(viewport) || count === 0 || viewport.lines.length === 0) {
    return viewport;
  }
  return setYOffset(viewport, viewport.yOffset - count);
};

export const halfViewDown = (viewport: ViewportState): ViewportState =>
  lineDown(viewport, Math.floor(viewport.height / 2));

export const halfViewUp = (viewport: ViewportState): ViewportState =>
  lineUp(viewport, Math.floor(viewport.height / 2));

export const viewDown = (viewport: ViewportState): ViewportState =>
  lineDown(viewport, viewport.height);

export const viewUp = (viewport: ViewportState): ViewportState => lineUp(viewport, viewport.height);

export const visibleLines = (viewport: ViewportState): string[] => {
  const start = Math.min(viewport.yOffset, viewport.lines.length);
  return viewport.lines.slice(start, start + viewport.height);
};

export const roundHalfToEven = (value: number): number => {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction !== 0.5) {
    return Math.round(value);
  }
  return floor % 2 === 0 ? floor : floor + 1;
};

export const editorLine = (viewport: ViewportState): number => {
  if (atTop(viewport)) {
    return 0;
  }
  return roundHalfToEven(totalLineCount(viewport) * scrollPercent(viewport));
};
