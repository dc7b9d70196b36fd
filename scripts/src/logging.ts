export type Severity =
  | "Debug"
  | "Trace"
  | "Info"
  | "Warning"
  | "Error"
  | "Fatal";

export type Logger = {
  debug: (...parts: unknown[]) => void;
  trace: (...parts: unknown[]) => void;
  info: (...parts: unknown[]) => void;
  warning: (...parts: unknown[]) => void;
  error: (...parts: unknown[]) => void;
  fatal: (...parts: unknown[]) => void;
};

export function formatMessage(severity: Severity, parts: unknown[]): string {
  return [`\n(${severity})`, ...parts.map((part) => String(part))].join(" ");
}

/**
 * Console logger used by every command. Debug lines are only printed when
 * `debug` is set (GENERATION_DEBUG / AUTOMATION_DEBUG); errors go to stderr.
 */
export function createLogger(options: { debug?: boolean } = {}): Logger {
  const out = (severity: Severity, parts: unknown[]) =>
    console.log(formatMessage(severity, parts));
  const err = (severity: Severity, parts: unknown[]) =>
    console.error(formatMessage(severity, parts));

  return {
    debug: (...parts) => {
      if (options.debug) {
        out("Debug", parts);
      }
    },
    trace: (...parts) => out("Trace", parts),
    info: (...parts) => out("Info", parts),
    warning: (...parts) => out("Warning", parts),
    error: (...parts) => err("Error", parts),
    fatal: (...parts) => err("Fatal", parts),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  trace: () => {},
  info: () => {},
  warning: () => {},
  error: () => {},
  fatal: () => {},
};
