/**
 * Scanner output cleaning.
 * Strips ANSI codes and banner/progress noise so lines can be parsed or shown.
 */

import stripAnsi from "strip-ansi";

/**
 * Lines that carry no information for a caller.
 */
const NOISE_PATTERNS = [
  // ASCII-art banner rows
  /^[\s_/\\|.'`,-]+$/,

  // Banner footer
  /projectdiscovery\.io/i,

  // Periodic stats: "[0:00:05] | Templates: 12 | Hosts: 2 | ..."
  /^\[\d+:\d{2}:\d{2}\]/,

  // Spinner characters
  /^[\s⠋⠙⠹⠸⠼⠴⠦⠧⠇⠏]+$/,
];

/**
 * Lines that explain a failure.
 */
const SEVERE_PATTERNS = [/^\[(ERR|FTL)\]/, /\berror\b/i, /\bfatal\b/i, /\bfailed\b/i];

/**
 * Strip ANSI codes and surrounding whitespace.
 */
export function cleanLine(line: string): string {
  return stripAnsi(line).trim();
}

export function isNoise(cleaned: string): boolean {
  return cleaned === "" || NOISE_PATTERNS.some((pattern) => pattern.test(cleaned));
}

/**
 * Clean every line and drop noise.
 */
export function cleanOutput(lines: readonly string[]): string[] {
  const cleaned: string[] = [];
  for (const line of lines) {
    const text = cleanLine(line);
    if (!isNoise(text)) {
      cleaned.push(text);
    }
  }
  return cleaned;
}

/**
 * Pick the line that best explains a failed run: the last error-looking
 * line, else the last meaningful line. Null when there is nothing useful.
 */
export function failureDetail(lines: readonly string[]): string | null {
  const cleaned = cleanOutput(lines);

  for (let i = cleaned.length - 1; i >= 0; i--) {
    if (SEVERE_PATTERNS.some((pattern) => pattern.test(cleaned[i]))) {
      return cleaned[i];
    }
  }

  return cleaned.length > 0 ? cleaned[cleaned.length - 1] : null;
}
