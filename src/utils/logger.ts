import chalk from "chalk";

export type Level = "debug" | "info" | "warn" | "error";

const levelOrder: Record<Level, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLevel(value: string | undefined): value is Level {
  return value !== undefined && value in levelOrder;
}

export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): Level {
  const raw = (env.DIR_CACHE_LOG_LEVEL ?? env.LOG_LEVEL)?.toLowerCase();
  return isLevel(raw) ? raw : "info";
}

export function format(
  level: Level,
  message: string,
  meta?: Record<string, unknown>,
  scope?: string
) {
  const color =
    level === "debug"
      ? chalk.gray
      : level === "info"
        ? chalk.cyan
        : level === "warn"
          ? chalk.yellow
          : chalk.red;
  const ts = new Date().toISOString();
  const label = scope ? `${chalk.magenta(`[${scope}]`)} ${message}` : message;
  const base = `${ts} ${color(level.toUpperCase())} ${label}`;
  if (!meta || Object.keys(meta).length === 0) {
    return base;
  }
  return `${base} ${chalk.gray(JSON.stringify(meta))}`;
}

// stdout belongs to the CLI's values, so every level goes to stderr.
export class Logger {
  constructor(
    private threshold: Level = levelFromEnv(),
    private readonly scope?: string,
    private readonly parent?: Logger
  ) {}

  /** Child loggers follow the parent's level, including later changes. */
  child(scope: string) {
    return new Logger(this.threshold, this.scope ? `${this.scope}:${scope}` : scope, this);
  }

  get level(): Level {
    return this.parent ? this.parent.level : this.threshold;
  }

  setLevel(level: Level) {
    if (this.parent) {
      this.parent.setLevel(level);
      return;
    }
    this.threshold = level;
  }

  private shouldLog(level: Level) {
    return levelOrder[level] >= levelOrder[this.level];
  }

  log(level: Level, message: string, meta?: Record<string, unknown>) {
    if (!this.shouldLog(level)) return;
    process.stderr.write(`${format(level, message, meta, this.scope)}\n`);
  }

  debug(message: string, meta?: Record<string, unknown>) {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>) {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>) {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>) {
    this.log("error", message, meta);
  }
}

export const logger = new Logger();
