export const ESC = "\u001b[";
export const RESET = `${ESC}0m`;

export const COLORS = {
  accent: `${ESC}1;97m`,
  muted: `${ESC}90m`,
  error: `${ESC}31m`,
  success: `${ESC}32m`,
  warn: `${ESC}33m`,
  path: `${ESC}34m`,
};

export type ColorKey = keyof typeof COLORS;
