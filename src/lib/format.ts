import { clampPercent } from "./normalize";
import type { StatusIcon } from "../models/usage";

export const BAR_WIDTH = 20;

const FILLED_CELL = "█";
const EMPTY_CELL = "░";

const STATUS_GLYPHS: Record<StatusIcon, string> = {
  nominal: "●",
  warning: "◐",
  critical: "○",
  neutral: "◉",
};

export function statusGlyph(icon: StatusIcon): string {
  return STATUS_GLYPHS[icon];
}

/** 1_500_000 -> "1.5M", 42_000 -> "42.0K", 750 -> "750". */
export function formatCompactNumber(value: number): string {
  const whole = Math.trunc(value);
  if (whole >= 1_000_000) {
    return `${(whole / 1_000_000).toFixed(1)}M`;
  }

  if (whole >= 1_000) {
    return `${(whole / 1_000).toFixed(1)}K`;
  }

  return whole.toString();
}

export function formatPercent(value: number): string {
  return `${Math.round(value)}%`;
}

export function renderBar(percentage: number, width = BAR_WIDTH): string {
  const filled = Math.round((width * clampPercent(percentage)) / 100);
  return FILLED_CELL.repeat(filled) + EMPTY_CELL.repeat(width - filled);
}
