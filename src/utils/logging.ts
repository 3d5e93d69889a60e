/** Diagnostics go to stderr; stdout carries JSON-RPC frames only. */

export type LogFn = (message: string) => void;

export const LOG_PREFIX = '[nuclide-query]';

/** `[nuclide-query] message`, or `[nuclide-query:scope] message`. */
export function createLogger(scope?: string): LogFn {
  const prefix = scope ? `${LOG_PREFIX.slice(0, -1)}:${scope}]` : LOG_PREFIX;
  return (message) => {
    console.error(`${prefix} ${message}`);
  };
}

function routeToStderr(...args: unknown[]): void {
  console.error(...args);
}

export function routeConsoleToStderr(): void {
  if (console.log !== routeToStderr) console.log = routeToStderr;
  if (console.debug !== routeToStderr) console.debug = routeToStderr;
  if (console.info !== routeToStderr) console.info = routeToStderr;
}
