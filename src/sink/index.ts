import { AppConfig } from "../config";
import { Logger } from "../observability";
import { OutputMode } from "../types";
import { ConsoleSink } from "./consoleSink";
import { CsvFileSink } from "./csvFileSink";
import { PrettyTableSink } from "./prettyTableSink";
import { LineWriter, Sink } from "./types";

export interface SinkDependencies {
  config: AppConfig;
  logger: Logger;
  write?: LineWriter;
}

const stdoutWriter: LineWriter = (line) => {
  console.log(line);
};

export function createSink(outputMode: OutputMode, deps: SinkDependencies): Sink {
  const write = deps.write ?? stdoutWriter;

  switch (outputMode) {
    case "none":
      return new ConsoleSink(write);
    case "pretty":
      return new PrettyTableSink(write);
    case "file":
      return new CsvFileSink(deps.config, deps.logger);
    default:
      throw new Error(`Unsupported output mode: ${String(outputMode)}`);
  }
}

export { ConsoleSink } from "./consoleSink";
export { CsvFileSink, formatTimestamp, toCsvLine } from "./csvFileSink";
export { PrettyTableSink, renderTable } from "./prettyTableSink";
export * from "./types";
