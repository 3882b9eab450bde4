/**
 * Error types thrown by the circuit and result APIs.
 *
 * Dataset parsing never throws; its problems are reported on the dataset.
 */

export class NetbindError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Bad component or terminal reference while building or querying a circuit.
 */
export class CircuitStructureError extends NetbindError {
  constructor(
    message: string,
    readonly component: string,
    readonly terminal?: string,
  ) {
    super(message);
  }
}

export class VectorNotFoundError extends NetbindError {
  constructor(
    readonly vector: string,
    readonly available: readonly string[],
    what = "Vector",
  ) {
    super(
      `${what} '${vector}' not found. Available: ${available.length > 0 ? available.join(", ") : "(none)"}`,
    );
  }
}

/**
 * The terminal has no node id, usually because the circuit was never resolved.
 */
export class PinNotConnectedError extends NetbindError {
  constructor(
    readonly component: string,
    readonly terminal: string,
  ) {
    super(
      `Pin ${component}.${terminal} is not connected: run resolveNodes() on the circuit that owns ${component} first`,
    );
  }
}

export class CurrentNotAvailableError extends NetbindError {
  constructor(
    readonly component: string,
    readonly available: readonly string[],
  ) {
    super(
      `Current not available for component ${component}. Only sources and current probes report currents. Available: ${available.length > 0 ? available.join(", ") : "(none)"}`,
    );
  }
}
