// Console logger. Differentiates between development and production.

const isDev = process.env.NODE_ENV !== "production";

function stringify(arg: unknown): string {
  if (arg instanceof Error) {
    return `${arg.name}: ${arg.message}`;
  }
  if (typeof arg === "object" && arg !== null) {
    try {
      return JSON.stringify(arg);
    } catch {
      return String(arg);
    }
  }
  return String(arg);
}

export function format(level: string, ...args: unknown[]): string {
  const processedArgs = args.map(stringify);
  const prefix = isDev ? `[${new Date().toISOString()}] [${level}]` : `[${level}]`;
  return prefix + (processedArgs.length ? " " : "") + processedArgs.join(" ");
}

export const logger = {
  debug: (...args: unknown[]) => {
    if (isDev) console.debug(format("DEBUG", ...args));
  },
  info: (...args: unknown[]) => {
    console.info(format("INFO", ...args));
  },
  warn: (...args: unknown[]) => {
    console.warn(format("WARN", ...args));
  },
  error: (...args: unknown[]) => {
    console.error(format("ERROR", ...args));
  },
};
