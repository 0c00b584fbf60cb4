/**
 * CLI table formatting
 */

export function formatTable(headers: string[], rows: string[][]): string[] {
  if (rows.length === 0) {
    return ["No data to display"];
  }

  const allRows = [headers, ...rows];
  const colWidths = headers.map((_, colIndex) => {
    return Math.max(...allRows.map(row => (row[colIndex] || "").length));
  });

  const lines = [
    headers.map((header, i) => header.padEnd(colWidths[i])).join(" │ ").trimEnd(),
    colWidths.map(width => "─".repeat(width)).join("─┼─"),
  ];

  rows.forEach(row => {
    lines.push(row.map((cell, i) => (cell || "").padEnd(colWidths[i])).join(" │ ").trimEnd());
  });

  return lines;
}
