export type DebugLogger = (message: string) => void;

export function consoleLogger(prefix = "[microdiff]"): DebugLogger {
  return (message) => {
    console.debug(`${prefix} ${message}`);
  };
}
