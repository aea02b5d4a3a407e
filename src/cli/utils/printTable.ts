/**
 * drivefs CLI - Table Printer Utility
 * Pretty prints tabular data to the console
 */

export type LineWriter = (line: string) => void;

export function printTable(headers: string[], rows: string[][], out: LineWriter = console.log): void {
  if (rows.length === 0) {
    out("No entries");
    return;
  }

  // Calculate column widths
  const allRows = [headers, ...rows];
  const colWidths = headers.map((_, colIndex) => {
    return Math.max(...allRows.map((row) => stripAnsi(row[colIndex] || "").length));
  });

  const formatRow = (row: string[]) =>
    row
      .map((cell, i) => (cell || "").padEnd(colWidths[i] ?? 0))
      .join(" │ ")
      .trimEnd();

  out(formatRow(headers));
  out(colWidths.map((width) => "─".repeat(width)).join("─┼─"));
  rows.forEach((row) => out(formatRow(row)));
}

/**
 * Strip ANSI escape codes from string for length calculation
 */
function stripAnsi(str: string): string {
  return str.replace(/\u001b\[[0-9;]*m/g, "");
}
