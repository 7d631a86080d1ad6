import pino, { type Logger, type LevelWithSilent } from "pino";

const LEVELS: readonly LevelWithSilent[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function resolveLevel(): LevelWithSilent {
  const requested = process.env.HELMSMAN_LOG_LEVEL?.toLowerCase();
  const match = LEVELS.find((level) => level === requested);
  if (match) return match;
  // Keep test output readable unless a level is asked for explicitly
  return process.env.VITEST ? "silent" : "info";
}

// stderr, so CLI output on stdout stays machine-readable
export const logger: Logger = pino(
  {
    name: "helmsman",
    level: resolveLevel(),
    base: { pid: process.pid },
  },
  pino.destination(2)
);

export function createLogger(component: string): Logger {
  return logger.child({ component });
}
