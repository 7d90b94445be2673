/** Receiver for diagnostic lines emitted while filling and painting */
export interface FillTrace {
  info(line: string): void;
  warn(line: string): void;
}

export const consoleTrace: FillTrace = {
  info: line => console.info(line),
  warn: line => console.warn(line),
};

export interface TraceOptions {
  /** Log to the console */
  debug?: boolean;
  /** Log to a custom sink instead; implies debug */
  trace?: FillTrace;
}

/** Resolve options to a sink, or undefined when tracing is off */
export function resolveTrace(opts: TraceOptions = {}): FillTrace | undefined {
  if (opts.trace) return opts.trace;
  return opts.debug ? consoleTrace : undefined;
}

/** Prefix every line with `[tag]` */
export function taggedTrace(trace: FillTrace, tag: string): FillTrace {
  return {
    info: line => trace.info(`[${tag}] ${line}`),
    warn: line => trace.warn(`[${tag}] ${line}`),
  };
}
