/**
 * CLI UI utilities - TTY-aware output
 *
 * - stdout carries data only (results, JSON, tables)
 * - stderr carries everything meant for the operator
 */

// Detect if running in interactive terminal
export const isTTY = process.stdout.isTTY ?? false

let quietMode = false

export function setQuiet(quiet: boolean): void {
  quietMode = quiet
}

/**
 * Output data to stdout (for pipes)
 * This is the ONLY function that should write to stdout for data
 */
export function output(data: string): void {
  process.stdout.write(data + '\n')
}

/**
 * Log message to stderr (doesn't interfere with pipes)
 */
export function log(message: string): void {
  if (!quietMode) {
    console.error(message)
  }
}

/**
 * Format rows as aligned columns; tab-separated when piped
 */
export function formatSimpleTable(headers: string[], rows: string[][], tty: boolean = isTTY): string {
  if (!tty) {
    return rows.map(row => row.join('\t')).join('\n')
  }

  const widths = headers.map((h, i) =>
    Math.max(h.length, ...rows.map(row => (row[i] ?? '').length))
  )
  const line = (cells: string[]) =>
    cells.map((cell, i) => cell.padEnd(widths[i])).join('  ').trimEnd()

  return [
    line(headers),
    line(widths.map(w => '─'.repeat(w))),
    ...rows.map(line)
  ].join('\n')
}

