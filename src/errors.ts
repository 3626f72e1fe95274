/**
 * Error types
 *
 * Linkage failures are not thrown: they become ErrorNodes in the graph.
 * Only broken assumptions about the runtime and bad configuration throw.
 */

export const EXIT_FRAME_NOT_FOUND = 'Could not find exit frame for current task';
export const ENTRY_POINT_NOT_FOUND = 'Could not link current task to entry point.';

export class AsyncGraphError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * The runtime's awaiter model did not hold, e.g. no terminal node was found
 */
export class AsyncGraphInvariantError extends AsyncGraphError {}

export class AsyncGraphConfigError extends AsyncGraphError {
  constructor(readonly issues: string[]) {
    super(`Invalid async-graph configuration: ${issues.join('; ')}`);
  }
}
