/**
 * Serialize rows to CSV text with a header line.
 * Fields containing a separator, quote or line break are quoted.
 */
export function toCsv<T extends object, K extends keyof T & string>(
  columns: readonly K[],
  rows: readonly T[],
): string {
  const lines = [
    columns.map(escapeField).join(','),
    ...rows.map((row) =>
      columns.map((column) => escapeField(String(row[column]))).join(','),
    ),
  ];
  return `${lines.join('\n')}\n`;
}

function escapeField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replaceAll('"', '""')}"` : value;
}
