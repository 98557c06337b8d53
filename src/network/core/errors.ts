/**
 * Error hierarchy for the link engines.
 *
 * `kind` lets callers tell back-pressure (queue-full / queue-empty) apart
 * from fatal conditions without instanceof chains across module copies.
 */

export type PhyErrorKind =
  | 'configuration'
  | 'contract'
  | 'queue-full'
  | 'queue-empty'
  | 'simulation';

export class PhyError extends Error {
  readonly kind: PhyErrorKind;
  /** Name of the engine or component that raised the error */
  readonly source?: string;

  constructor(kind: PhyErrorKind, message: string, source?: string) {
    super(source ? `${source}: ${message}` : message);
    this.name = 'PhyError';
    this.kind = kind;
    this.source = source;
  }

  /** Fatal errors must not be retried. */
  isFatal(): boolean {
    return this.kind !== 'queue-full' && this.kind !== 'queue-empty';
  }
}

/** Bad bus width, unsupported speed, invalid option. Raised at construction or reconfiguration. */
export class ConfigurationError extends PhyError {
  constructor(message: string, source?: string) {
    super('configuration', message, source);
    this.name = 'ConfigurationError';
  }
}

/** A frame or bus state broke an encoding contract while the engine was running. */
export class ContractViolationError extends PhyError {
  /** Zero-based index of the offending frame in the engine's stream */
  readonly frameIndex?: number;

  constructor(message: string, source?: string, frameIndex?: number) {
    super('contract', frameIndex === undefined ? message : `${message} (frame #${frameIndex})`, source);
    this.name = 'ContractViolationError';
    this.frameIndex = frameIndex;
  }
}

export class QueueFullError extends PhyError {
  constructor(source?: string) {
    super('queue-full', 'transmit queue full', source);
    this.name = 'QueueFullError';
  }
}

export class QueueEmptyError extends PhyError {
  constructor(source?: string) {
    super('queue-empty', 'receive queue empty', source);
    this.name = 'QueueEmptyError';
  }
}

export class SimulationError extends PhyError {
  constructor(message: string) {
    super('simulation', message);
    this.name = 'SimulationError';
  }
}

export class SimulationTimeoutError extends SimulationError {
  /** Simulation time (ps) at which the run gave up */
  readonly time: number;

  constructor(time: number, timeout: number) {
    super(`run did not complete within ${timeout} ps (stopped at ${time} ps)`);
    this.name = 'SimulationTimeoutError';
    this.time = time;
  }
}

export function isPhyError(err: unknown): err is PhyError {
  return err instanceof PhyError;
}
