export type LogPayload = Record<string, unknown>;

export type InsightsLogger = {
  debug: (event: string, payload?: LogPayload) => void;
  info: (event: string, payload?: LogPayload) => void;
  warn: (event: string, payload?: LogPayload) => void;
};

type ConsoleLoggerOptions = {
  tag?: string;
  debug?: boolean;
};

function toLine(tag: string, event: string, payload: LogPayload | undefined): string {
  return `[${tag}] ${JSON.stringify({ event, ...payload })}`;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): InsightsLogger {
  const tag = options.tag ?? "INSIGHTS";
  const debugEnabled = options.debug ?? false;

  return {
    debug: (event, payload) => {
      if (!debugEnabled) return;
      console.info(toLine(tag, event, payload));
    },
    info: (event, payload) => {
      console.info(toLine(tag, event, payload));
    },
    warn: (event, payload) => {
      console.warn(toLine(tag, event, payload));
    }
  };
}

export const silentLogger: InsightsLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined
};
