import pino, { type Level, type Logger as PinoLogger } from "pino";

let root: PinoLogger | undefined;

function rootLogger(): PinoLogger {
  if (!root) {
    const isTest = process.env.NODE_ENV === "test";
    const level = process.env.LOG_LEVEL ?? (isTest ? "silent" : "info");
    root = isTest
      ? pino({ level })
      : pino({
          level,
          transport: {
            targets: [
              {
                target: "pino-pretty",
                level,
                options: {
                  colorize: true,
                },
              },
            ],
          },
        });
  }
  return root;
}

export class Logger {
  readonly logger: PinoLogger;

  constructor(private context?: string) {
    if (context) {
      this.setContext(context);
    }

    this.logger = rootLogger();
  }

  public setContext(context: string) {
    this.context = context;
  }

  verbose(message: unknown, ...optionalParams: unknown[]) {
    this.call("trace", message, ...optionalParams);
  }

  debug(message: unknown, ...optionalParams: unknown[]) {
    this.call("debug", this.withContext(message), ...optionalParams);
  }

  log(message: unknown, ...optionalParams: unknown[]) {
    this.call("info", this.withContext(message), ...optionalParams);
  }

  warn(message: unknown, ...optionalParams: unknown[]) {
    this.call("warn", this.withContext(message), ...optionalParams);
  }

  error(message: unknown, ...optionalParams: unknown[]) {
    this.call("error", message, ...optionalParams);
  }

  fatal(message: unknown, ...optionalParams: unknown[]) {
    this.call("fatal", message, ...optionalParams);
  }

  private withContext(message: unknown): unknown {
    return this.context && typeof message === "string"
      ? `[${this.context}]: ${message}`
      : message;
  }

  private call(level: Level, message: unknown, ...optionalParams: unknown[]) {
    const objArg: Record<string, unknown> = {};

    let params: unknown[] = [];
    if (optionalParams.length !== 0) {
      objArg[this.context || ""] = optionalParams[optionalParams.length - 1];
      params = optionalParams.slice(0, -1);
    }

    if (message instanceof Error) {
      objArg["err"] = message;
      this.logger[level](objArg, message.message, ...params);
    } else if (typeof message === "object" && message !== null) {
      Object.assign(objArg, message);
      this.logger[level](objArg, "", ...params);
    } else if (this.isWrongExceptionsHandlerContract(level, message, params)) {
      const err = new Error(String(message));
      err.stack = params[0];
      objArg["err"] = err;
      this.logger[level](objArg);
    } else {
      this.logger[level](objArg, String(message), ...params);
    }
  }

  private isWrongExceptionsHandlerContract(
    level: Level,
    message: unknown,
    params: unknown[],
  ): params is [string] {
    return (
      level === "error" &&
      typeof message === "string" &&
      params.length === 1 &&
      typeof params[0] === "string" &&
      /\n\s*at /.test(params[0])
    );
  }
}
