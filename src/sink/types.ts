import { ModeName, Row } from "../types";

export type LineWriter = (line: string) => void;

export interface Sink {
  publishRows(mode: ModeName, rows: readonly Row[]): Promise<void>;
}
