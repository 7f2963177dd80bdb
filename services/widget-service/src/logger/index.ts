import pino from "pino";
import dotenv from "dotenv";

dotenv.config({
    quiet: true,
});

const env = process.env.NODE_ENV;
const level =
    process.env.LOG_LEVEL ??
    (env === "test" ? "silent" : env === "development" ? "debug" : "info");

// stdout carries the rendered fragment, so every log line goes to stderr
export const logger = env === "development"
    ? pino({
        level,
        timestamp: pino.stdTimeFunctions.isoTime,
        base: { pid: process.pid },
        transport: {
            target: "pino-pretty",
            options: {
                colorize: true,
                destination: 2,
                translateTime: "yyyy-mm-dd HH:MM:ss",
                ignore: "pid,hostname",
            },
        },
    })
    : pino(
        {
            level,
            timestamp: pino.stdTimeFunctions.isoTime,
            base: { pid: process.pid },
        },
        pino.destination(2)
    );
