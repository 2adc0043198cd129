import pino from "pino";

// stdout carries the MCP protocol; logs go to stderr.
export const logger = pino(
  {
    name: "sysconfig-compose",
    level: process.env.LOG_LEVEL ?? "info",
  },
  pino.destination(2),
);
