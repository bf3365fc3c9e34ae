export interface Logger {
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

let quiet = process.env.CODEWARD_QUIET === "1" || process.env.CODEWARD_QUIET === "true";

export function setQuiet(value: boolean): void {
  quiet = value;
}

/** Console logger that tags every line with `[prefix]`. */
export function createLogger(prefix: string): Logger {
  return {
    info: (msg) => {
      if (!quiet) console.log(`[${prefix}] ${msg}`);
    },
    warn: (msg) => {
      if (!quiet) console.warn(`[${prefix}] ${msg}`);
    },
    error: (msg) => {
      if (!quiet) console.error(`[${prefix}] ${msg}`);
    },
  };
}
