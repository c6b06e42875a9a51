import pino from "pino";

// stdout carries the MCP protocol, so logs always go to stderr.
export const logger = pino(
  {
    name: "shell-env-probe",
    level: process.env.LOG_LEVEL ?? "info",
  },
  pino.destination(2),
);
