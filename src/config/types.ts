export type LogLevel = "error" | "warn" | "info" | "debug" | "trace";
export type LogFormat = "pretty" | "json";

export interface Config {
  db: {
    path: string;
  };

  data: {
    root: string;
  };

  tracker: {
    pollMs: number;
    damageCeiling: number; // damage above this is treated as an OCR misread
    maxNounDistance: number; // corrections must be strictly closer than this
  };

  capture: {
    command?: string; // external OCR command, stdout = recognised text
  };

  logging: {
    level: LogLevel;
    scopes?: string[]; // empty/undefined => all
    format: LogFormat;
  };
}
