export type LogLevel = 'error' | 'warn' | 'info' | 'http' | 'verbose' | 'debug' | 'silly';

export interface AppConfig {
  imagesDir: string;          // absolute
  workers: number;
  startPort: number;
  host: string;
  logDir: string;             // absolute
  logLevel: LogLevel;
  maxSize: number;            // in bytes
  supportedFormats: ReadonlySet<string>;  // lower-case, with leading dot
  imagesUrlPrefix: string;
}
