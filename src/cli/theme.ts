// ANSI escape codes for styling
const ESC = '\x1b[';

export const colors = {
  reset: `${ESC}0m`,

  gray: `${ESC}90m`,

  // Bright colors
  brightRed: `${ESC}91m`,
  brightGreen: `${ESC}92m`,
  brightCyan: `${ESC}96m`,
} as const;

export const style = {
  bold: `${ESC}1m`,
} as const;

// Semantic colors for the application
export const theme = {
  primary: colors.brightCyan,
  success: colors.brightGreen,
  error: colors.brightRed,
  muted: colors.gray,
  prompt: colors.brightGreen,
} as const;
