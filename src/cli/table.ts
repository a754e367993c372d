export type ColumnAlign = "left" | "right";

export interface TableColumn {
  header: string;
  align: ColumnAlign;
}

function padCell(value: string, width: number, align: ColumnAlign): string {
  return align === "right" ? value.padStart(width) : value.padEnd(width);
}

function separator(width: number, align: ColumnAlign): string {
  const dashes = "-".repeat(width - 1);
  return align === "right" ? `${dashes}:` : `:${dashes}`;
}

/** Renders a pipe table with an alignment row, one string per line. */
export function formatTable(columns: readonly TableColumn[], rows: readonly (readonly string[])[]): string[] {
  const widths = columns.map((column, index) =>
    Math.max(2, column.header.length, ...rows.map((row) => (row[index] ?? "").length)),
  );

  const renderRow = (cells: readonly string[]): string =>
    `|${columns.map((column, index) => padCell(cells[index] ?? "", widths[index], column.align)).join("|")}|`;

  return [
    renderRow(columns.map((column) => column.header)),
    `|${columns.map((column, index) => separator(widths[index], column.align)).join("|")}|`,
    ...rows.map(renderRow),
  ];
}
