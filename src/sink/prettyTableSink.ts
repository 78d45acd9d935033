import { ModeName, Row } from "../types";
import { BaseSink } from "./baseSink";
import { LineWriter } from "./types";

export function renderTable(rows: readonly (readonly string[])[]): string[] {
  if (rows.length === 0) {
    return [];
  }

  const columnCount = Math.max(...rows.map((row) => row.length));
  const widths = Array.from({ length: columnCount }, (_, column) =>
    Math.max(...rows.map((row) => (row[column] ?? "").length)),
  );
  const border = `+${widths.map((width) => "-".repeat(width + 2)).join("+")}+`;
  const renderRow = (row: readonly string[]): string =>
    `| ${widths.map((width, column) => (row[column] ?? "").padEnd(width)).join(" | ")} |`;

  const [header, ...body] = rows;
  const lines = [border, renderRow(header), border];
  if (body.length > 0) {
    lines.push(...body.map(renderRow), border);
  }
  return lines;
}

export class PrettyTableSink extends BaseSink {
  private readonly write: LineWriter;

  constructor(write: LineWriter) {
    super();
    this.write = write;
  }

  async publishRows(_mode: ModeName, rows: readonly Row[]): Promise<void> {
    for (const line of renderTable(this.toText(rows))) {
      this.write(line);
    }
  }
}
