import { Cell, ModeName, Row } from "../types";
import { Sink } from "./types";

export abstract class BaseSink implements Sink {
  abstract publishRows(mode: ModeName, rows: readonly Row[]): Promise<void>;

  protected toText(rows: readonly Row[]): string[][] {
    return rows.map((row) => row.map((cell: Cell) => String(cell)));
  }
}
