import {
  intro as designIntro,
  log,
  resolveOutputFormat,
  symbols
} from "@wtt/design-system";

export type LoggerFn = (message: string) => void;

export interface LoggerContext {
  verbose?: boolean;
  scope?: string;
}

export interface ScopedLogger {
  readonly context: Required<Pick<LoggerContext, "verbose">> &
    Pick<LoggerContext, "scope">;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  verbose(message: string): void;
  intro(title: string): void;
  resolved(label: string, value: string): void;
  output(content: string): void;
  child(context: Partial<LoggerContext>): ScopedLogger;
}

export interface LoggerFactory {
  create(context?: LoggerContext): ScopedLogger;
}

export function createLoggerFactory(emitter?: LoggerFn): LoggerFactory {
  const emit = (
    level: "info" | "success" | "warn" | "error",
    message: string
  ): void => {
    if (emitter) {
      emitter(message);
      return;
    }
    if (resolveOutputFormat() !== "terminal") {
      process.stdout.write(message + "\n");
      return;
    }
    if (level === "success") {
      log.message(message, { symbol: symbols.success });
      return;
    }
    if (level === "warn") {
      log.warn(message);
      return;
    }
    if (level === "error") {
      log.error(message);
      return;
    }
    log.message(message, { symbol: symbols.info });
  };

  const create = (context: LoggerContext = {}): ScopedLogger => {
    const verbose = context.verbose ?? false;
    const scope = context.scope;
    const formatMessage = (message: string): string =>
      scope && verbose ? `[${scope}] ${message}` : message;

    const scoped: ScopedLogger = {
      context: { verbose, scope },
      info(message) {
        emit("info", formatMessage(message));
      },
      success(message) {
        emit("success", message);
      },
      warn(message) {
        emit("warn", formatMessage(message));
      },
      error(message) {
        emit("error", formatMessage(message));
      },
      verbose(message) {
        if (!verbose) {
          return;
        }
        if (emitter) {
          emitter(formatMessage(message));
          return;
        }
        if (resolveOutputFormat() !== "terminal") {
          process.stderr.write(formatMessage(message) + "\n");
          return;
        }
        log.message(formatMessage(message), { symbol: symbols.verbose });
      },
      intro(title) {
        if (emitter) {
          emitter(title);
          return;
        }
        designIntro(title);
      },
      resolved(label, value) {
        if (emitter) {
          emitter(`${label}: ${value}`);
          return;
        }
        if (resolveOutputFormat() !== "terminal") {
          process.stdout.write(`${label}: ${value}\n`);
          return;
        }
        log.message(`${label}\n   ${value}`, { symbol: symbols.resolved });
      },
      output(content) {
        if (emitter) {
          emitter(content);
          return;
        }
        process.stdout.write(content.endsWith("\n") ? content : `${content}\n`);
      },
      child(next) {
        return create({
          verbose: next.verbose ?? verbose,
          scope: next.scope ?? scope
        });
      }
    };

    return scoped;
  };

  return { create };
}
