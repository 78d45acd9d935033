import fs from "node:fs";
import path from "node:path";
import { AppConfig } from "../config";
import { Logger } from "../observability";
import { ModeName, Row } from "../types";
import { BaseSink } from "./baseSink";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function toCsvLine(fields: readonly string[]): string {
  return fields.map((field) => `"${field.replace(/"/g, '""')}"`).join(",");
}

export class CsvFileSink extends BaseSink {
  private readonly resultsDir: string;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(config: AppConfig, logger: Logger, now: () => Date = () => new Date()) {
    super();
    this.resultsDir = path.resolve(config.outputDirs.results);
    this.logger = logger;
    this.now = now;
  }

  filePathFor(mode: ModeName, date: Date): string {
    return path.join(this.resultsDir, `${mode}_${formatTimestamp(date)}.csv`);
  }

  async publishRows(mode: ModeName, rows: readonly Row[]): Promise<void> {
    await fs.promises.mkdir(this.resultsDir, { recursive: true });
    const filePath = this.filePathFor(mode, this.now());
    const content = this.toText(rows)
      .map((row) => `${toCsvLine(row)}\n`)
      .join("");
    await fs.promises.writeFile(filePath, content, "utf-8");
    this.logger.info("csv_saved", { mode, path: filePath, rows: rows.length });
  }
}
