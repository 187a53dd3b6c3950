/**
 * Output helpers shared by the `planwright` commands.
 *
 * Human output is a plain-text table; `--output-format json` prints one
 * envelope line per invocation so scripts can pipe it straight into `jq`.
 */

// ---------------------------------------------------------------------------
// Tables
// ---------------------------------------------------------------------------

const CELL_SEPARATOR = ' | '
const RULE_JOINT = '-+-'

/**
 * Render rows as a table: a header line, a dashed rule, then one line per
 * row. `keys[i]` is the row field shown under `headers[i]`; missing fields
 * print empty. Trailing padding is trimmed from every line.
 */
export function formatTable(headers: string[], rows: Record<string, string>[], keys: string[]): string {
  const cell = (row: Record<string, string>, column: number): string => row[keys[column] ?? ''] ?? ''

  const widths = headers.map((header, column) =>
    rows.reduce((width, row) => Math.max(width, cell(row, column).length), header.length),
  )
  const line = (cells: string[]): string =>
    cells
      .map((text, column) => text.padEnd(widths[column] ?? 0))
      .join(CELL_SEPARATOR)
      .trimEnd()

  return [
    line(headers),
    widths.map((width) => '-'.repeat(width)).join(RULE_JOINT),
    ...rows.map((row) => line(keys.map((_key, column) => cell(row, column)))),
  ].join('\n')
}

// ---------------------------------------------------------------------------
// JSON envelope
// ---------------------------------------------------------------------------

export interface CLIJsonOutput<T> {
  /** When the command ran (ISO 8601) */
  timestamp: string
  /** planwright package version */
  version: string
  /** Full command name, e.g. `planwright status` */
  command: string
  data: T
}

export function buildJsonOutput<T>(command: string, data: T, version: string): CLIJsonOutput<T> {
  return { timestamp: new Date().toISOString(), version, command, data }
}

export function writeJson<T>(command: string, data: T, version: string): void {
  process.stdout.write(`${JSON.stringify(buildJsonOutput(command, data, version))}\n`)
}
