import type { LogLevel } from "../observability/types";

export interface OutputDirs {
  readonly results: string;
  readonly downloads: string;
}

// status letter of the PEP index abbreviation -> accepted card statuses
export type ExpectedStatusRegistry = Readonly<Record<string, readonly string[]>>;

export interface AppConfig {
  readonly mainDocUrl: string;
  readonly pepUrl: string;
  readonly userAgent: string;
  readonly ignoreHttpsErrors: boolean;
  readonly requestTimeoutMs?: number;
  readonly cacheDir: string;
  readonly logLevel: LogLevel;
  readonly logFile?: string;
  readonly expectedStatus: ExpectedStatusRegistry;
  readonly outputDirs: OutputDirs;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "outputDirs">> & {
  outputDirs?: Partial<OutputDirs>;
};
