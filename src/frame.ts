/**
 * Execution frames
 *
 * A frame is one synchronous call's activation record with a link to its
 * caller. Frames are supplied by the host; graph construction only reads them.
 */

/**
 * Host-supplied handle to one call-stack entry
 */
export interface ExecutionFrame {
  /** The calling frame, or null at the end of the chain */
  readonly caller: ExecutionFrame | null;
  toString(): string;
}

/**
 * Plain frame record, usable by any host that tracks its own stacks
 */
export class StackFrame implements ExecutionFrame {
  constructor(
    readonly name: string,
    readonly caller: ExecutionFrame | null = null,
    readonly location?: string
  ) {}

  toString(): string {
    return this.location ? `${this.name} (${this.location})` : this.name;
  }
}

/**
 * Build a frame chain from names, innermost first
 *
 * @returns The innermost frame, or null when no names are given
 *
 * @example
 * const frame = frameChain('printGraph', 'worker', 'main');
 * // printGraph -> worker -> main
 */
export function frameChain(...names: string[]): StackFrame | null {
  let caller: StackFrame | null = null;
  for (let i = names.length - 1; i >= 0; i--) {
    caller = new StackFrame(names[i], caller);
  }
  return caller;
}

/**
 * List a frame chain from innermost to outermost
 */
export function framesOf(frame: ExecutionFrame | null): ExecutionFrame[] {
  const frames: ExecutionFrame[] = [];
  for (let f = frame; f !== null; f = f.caller) {
    frames.push(f);
  }
  return frames;
}

function describeCallSite(site: NodeJS.CallSite): string {
  const fn = site.getFunctionName();
  if (fn) return fn;
  return site.isToplevel() ? '<module>' : '<anonymous>';
}

function locateCallSite(site: NodeJS.CallSite): string | undefined {
  const file = site.getFileName();
  if (!file) return undefined;
  return `${file}:${site.getLineNumber() ?? 0}:${site.getColumnNumber() ?? 0}`;
}

/**
 * Capture the current synchronous stack as a frame chain
 *
 * The innermost frame is the caller of `above`; by default that is whoever
 * called captureFrames. Frames from separate captures never share identity.
 *
 * @example
 * function whereAmI() {
 *   return String(captureFrames()); // 'whereAmI (/path/file.ts:2:10)'
 * }
 */
export function captureFrames(above: Function = captureFrames): StackFrame | null {
  const previousPrepare = Error.prepareStackTrace;
  const previousLimit = Error.stackTraceLimit;
  let sites: NodeJS.CallSite[] = [];

  try {
    Error.stackTraceLimit = Infinity;
    Error.prepareStackTrace = (_error, callSites) => {
      sites = callSites;
      return '';
    };
    const holder: { stack?: string } = {};
    Error.captureStackTrace(holder, above);
    // Reading the stack runs prepareStackTrace
    if (holder.stack === undefined) return null;
  } finally {
    Error.prepareStackTrace = previousPrepare;
    Error.stackTraceLimit = previousLimit;
  }

  let caller: StackFrame | null = null;
  for (let i = sites.length - 1; i >= 0; i--) {
    caller = new StackFrame(describeCallSite(sites[i]), caller, locateCallSite(sites[i]));
  }
  return caller;
}
