/**
 * ANSI styling for the chat transcript and the verbose log lines.
 */

const CODES = {
  bold: [1, 22],
  dim: [2, 22],
  red: [31, 39],
  green: [32, 39],
  yellow: [33, 39],
  magenta: [35, 39],
  cyan: [36, 39],
} as const

export type Color = keyof typeof CODES

/** NO_COLOR wins over FORCE_COLOR; otherwise color only on a terminal. */
export function shouldUseColor(
  isTTY: boolean | undefined = process.stdout.isTTY,
  env: Record<string, string | undefined> = process.env
): boolean {
  if (env.NO_COLOR) return false
  if (env.FORCE_COLOR) return true
  return Boolean(isTTY)
}

const enabled = shouldUseColor()

export function c(color: Color, text: string): string {
  if (!enabled) {
    return text
  }
  const [open, close] = CODES[color]
  return `\x1b[${open}m${text}\x1b[${close}m`
}
