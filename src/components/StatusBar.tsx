import { Text } from "ink";
import cliTruncate from "cli-truncate";
import stringWidth from "string-width";
import { roundHalfToEven } from "../lib/viewport.js";
import type { StatusBarColors } from "../lib/styles.js";
import type { PagerMode } from "../types/app.js";

export const LOGO = " pagemark ";
export const HELP_NOTE = " ? Help ";

export interface StatusSegments {
  logo: string;
  note: string;
  padding: string;
  scroll: string;
  help: string;
}

interface StatusBarProps {
  width: number;
  note: string;
  percent: number;
  mode: PagerMode;
  isError: boolean;
  colors: StatusBarColors;
}

export const formatScrollPercent = (percent: number): string => {
  const value = roundHalfToEven(Math.max(0, Math.min(1, percent)) * 100);
  return ` ${String(value).padStart(3, " ")}% `;
};

export const slideIndicator = (currentSlide: number, total: number): string =>
  ` [Slide ${currentSlide + 1}/${total}]`;

export const statusSegments = (width: number, note: string, percent: number): StatusSegments => {
  const scroll = formatScrollPercent(percent);
  const fixed = stringWidth(LOGO) + stringWidth(scroll) + stringWidth(HELP_NOTE);
  const fittedNote = cliTruncate(` ${note} `, Math.max(0, width - fixed));
  const padding = " ".repeat(Math.max(0, width - fixed - stringWidth(fittedNote)));
  return { logo: LOGO, note: fittedNote, padding, scroll, help: HELP_NOTE };
};

const pick = (colors: StatusBarColors, mode: PagerMode, isError: boolean) => {
  if (mode !== "statusMessage") {
    return {
      noteFg: colors.noteFg,
      noteBg: colors.barBg,
      barBg: colors.barBg,
      helpFg: colors.helpFg,
      helpBg: colors.helpBg
    };
  }
  if (isError) {
    return {
      noteFg: colors.errorFg,
      noteBg: colors.errorBg,
      barBg: colors.errorBg,
      helpFg: colors.errorFg,
      helpBg: colors.errorBg
    };
  }
  return {
    noteFg: colors.messageFg,
    noteBg: colors.messageBg,
    barBg: colors.messageBg,
    helpFg: colors.messageHelpFg,
    helpBg: colors.messageHelpBg
  };
};

export default function StatusBar({ width, note, percent, mode, isError, colors }: StatusBarProps) {
  const segments = statusSegments(width, note, percent);
  const palette = pick(colors, mode, isError);

  return (
    <Text wrap="truncate-end">
      <Text color={colors.logoFg} backgroundColor={colors.logoBg}>
        {segments.logo}
      </Text>
      <Text color={palette.noteFg} backgroundColor={palette.noteBg}>
        {segments.note}
      </Text>
      <Text backgroundColor={palette.barBg}>{segments.padding}</Text>
      <Text color={colors.scrollFg} backgroundColor={palette.barBg}>
        {segments.scroll}
      </Text>
      <Text color={palette.helpFg} backgroundColor={palette.helpBg}>
        {segments.help}
      </Text>
    </Text>
  );
}
