import type { ArticleRecord, FlatRow, FlattenOptions, PositionTable } from "./types";

export function flattenArticle(record: ArticleRecord, options: FlattenOptions = {}): FlatRow {
  const collision = options.collision ?? "packages-wins";
  const row: FlatRow = new Map(record.main);
  for (const [label, value] of record.packages ?? []) {
    if (collision === "main-wins" && row.has(label)) continue;
    row.set(label, value);
  }
  return row;
}

export function flattenArticles(records: ArticleRecord[], options: FlattenOptions = {}): PositionTable {
  const columns = new Set<string>();
  const rows = records.map((record) => {
    const row = flattenArticle(record, options);
    for (const label of row.keys()) columns.add(label);
    return row;
  });
  return { columns: Array.from(columns), rows };
}

export function tableCell(row: FlatRow, column: string): string {
  return row.get(column) ?? "";
}

export function toPlainRows(table: PositionTable): Array<Record<string, string>> {
  return table.rows.map((row) =>
    Object.fromEntries(table.columns.map((column) => [column, tableCell(row, column)])),
  );
}
