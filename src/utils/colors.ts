import process from "node:process";

// Colour only when writing to a terminal, and never when NO_COLOR is set (https://no-color.org)
const useColor = Boolean(process.stdout.isTTY) && !process.env.NO_COLOR;

const paint = (open: number, close: number) =>
  (text: string) => useColor ? `\x1b[${open}m${text}\x1b[${close}m` : text;

/**
 * Console colors using ANSI escape codes
 */
export const colors = {
  red: paint(31, 39),
  green: paint(32, 39),
  yellow: paint(33, 39),
  cyan: paint(36, 39),
  gray: paint(90, 39),
};

// Status markers used in progress output
export const symbols = {
  success: '✓',
  error: '✗',
};
