type Level = "debug" | "info" | "warn" | "error";

const LEVELS: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const timestamp = () => new Date().toISOString();

function isLevel(value: string): value is Level {
  return Object.hasOwn(LEVELS, value);
}

function threshold(): number {
  if (process.env.DEBUG === "true") return LEVELS.debug;
  const configured = (process.env.LOG_LEVEL || "info").toLowerCase();
  return isLevel(configured) ? LEVELS[configured] : LEVELS.info;
}

function enabled(level: Level): boolean {
  return LEVELS[level] >= threshold();
}

export const logger = {
  info(message: string, data?: unknown) {
    if (!enabled("info")) return;
    console.log(`[${timestamp()}] INFO: ${message}`, data ?? "");
  },
  error(message: string, error?: unknown) {
    if (!enabled("error")) return;
    console.error(`[${timestamp()}] ERROR: ${message}`, error ?? "");
  },
  warn(message: string, data?: unknown) {
    if (!enabled("warn")) return;
    console.warn(`[${timestamp()}] WARN: ${message}`, data ?? "");
  },
  debug(message: string, data?: unknown) {
    if (!enabled("debug")) return;
    console.log(`[${timestamp()}] DEBUG: ${message}`, data ?? "");
  },
};
