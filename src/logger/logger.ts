import pino from "pino";
import { isLogLevel } from "./levels";

const requested = (process.env.LOG_LEVEL ?? "").toLowerCase();
const logLevel = isLogLevel(requested) ? requested : "warn";
const isDev = process.stderr.isTTY === true;

// stdout carries command output, so logs go to stderr either way.
export const log = isDev
  ? pino({
      level: logLevel,
      transport: {
        target: "pino-pretty",
        options: { colorize: true, destination: 2 },
      },
    })
  : pino({ level: logLevel }, pino.destination(2));
