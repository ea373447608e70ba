import pino, { type Logger, type LevelWithSilent } from "pino";

export type { Logger };

// stdout carries the MCP protocol, so logs go to stderr
export function createLogger(level: LevelWithSilent = "info"): Logger {
  return pino({ name: "web-video-research", level }, pino.destination(2));
}
