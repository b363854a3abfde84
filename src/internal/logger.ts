export type LogScope = 'dispatch' | 'estimate' | 'adaptive' | 'sauvola';

export interface Logger {
  logTrace: (tag: string, ...args: unknown[]) => void;
  logWarn: (tag: string, ...args: unknown[]) => void;
}

function prefix(scope: LogScope, tag: string): string {
  return `[${scope}][${tag}]`;
}

/** Console logger; trace lines only print while `traceOn()` is true. */
export function createLogger(opts: { scope: LogScope; traceOn: () => boolean }): Logger {
  function logTrace(tag: string, ...args: unknown[]): void {
    if (!opts.traceOn()) return;
    console.log(prefix(opts.scope, tag), ...args);
  }

  function logWarn(tag: string, ...args: unknown[]): void {
    console.warn(prefix(opts.scope, tag), ...args);
  }

  return { logTrace, logWarn };
}
