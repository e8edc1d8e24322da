export const COLORS = {
  reset: "\x1b[0m",
  info: "\x1b[36m",
  success: "\x1b[32m",
  warn: "\x1b[33m",
  detail: "\x1b[90m"
} as const;

export const GLYPHS = {
  briefing: "◆",
  event: "→",
  feed: "→",
  publish: "⚡",
  success: "✓",
  warn: "⚠",
  info: "ℹ",
  folder: "▸",
  stats: "≡",
  timer: "⏱"
} as const;

export function logInfo(icon: string, message: string) {
  console.log(`${COLORS.info}${icon}${COLORS.reset} ${message}`);
}

export function logDetail(icon: string, message: string) {
  console.log(`${COLORS.detail}${icon}${COLORS.reset} ${message}`);
}

export function logSuccess(message: string) {
  console.log(`${COLORS.success}${GLYPHS.success}${COLORS.reset} ${message}`);
}

export function logWarn(message: string) {
  console.warn(`${COLORS.warn}${GLYPHS.warn}${COLORS.reset} ${message}`);
}

export function formatDuration(startTime: number): string {
  const seconds = Math.round((Date.now() - startTime) / 1000);
  const minutes = Math.floor(seconds / 60);
  const rest = seconds % 60;
  return minutes > 0 ? `${minutes}m ${rest}s` : `${rest}s`;
}

/** Keeps warnings off the spinner's line while one is running. */
export function guardConsole(isSpinning: () => boolean) {
  const originalWarn = console.warn.bind(console);
  const originalError = console.error.bind(console);
  console.warn = (...args: unknown[]) => {
    if (isSpinning()) process.stdout.write("\n");
    originalWarn(...args);
  };
  console.error = (...args: unknown[]) => {
    if (isSpinning()) process.stdout.write("\n");
    originalError(...args);
  };
}
