import { ModeName, Row } from "../types";
import { BaseSink } from "./baseSink";
import { LineWriter } from "./types";

export class ConsoleSink extends BaseSink {
  private readonly write: LineWriter;

  constructor(write: LineWriter) {
    super();
    this.write = write;
  }

  async publishRows(_mode: ModeName, rows: readonly Row[]): Promise<void> {
    for (const row of this.toText(rows)) {
      this.write(row.join(" "));
    }
  }
}
