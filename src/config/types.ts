import { LogLevel } from "../observability/types";

export interface AppConfig {
  listBaseUrl: string;
  pageSuffixes: string[];
  userAgent: string;
  ignoreHttpsErrors: boolean;
  markerColumn: string;
  datasetPath: string;
  logoDir: string;
  logoExtension: string;
  downloadConcurrency: number;
  manifestPath: string;
  logLevel: LogLevel;
}

export type ConfigOverrides = Partial<AppConfig>;
