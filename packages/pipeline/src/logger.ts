import pino from "pino";

export type Logger = pino.Logger;

const IS_TEST = process.env.NODE_ENV === "test" || Boolean(process.env.VITEST);

/**
 * Component logger. Logs go to stderr so a report printed on stdout stays
 * clean; pretty-printed outside production and tests, silent under Vitest
 * unless LOG_LEVEL says otherwise.
 */
export function createLogger(name: string): Logger {
  const level = process.env.LOG_LEVEL ?? (IS_TEST ? "silent" : "info");

  if (process.env.NODE_ENV === "production" || IS_TEST) {
    return pino({ name, level }, pino.destination(2));
  }

  return pino({
    name,
    level,
    transport: {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        destination: 2,
      },
    },
  });
}
