/**
 * Component kinds
 *
 * Data classes for the components a circuit description can name. The core
 * only reads their name, kind, ground flag and terminals; the remaining
 * fields are parameters for whatever serialises the netlist.
 */

import {
  UNASSIGNED_NODE,
  type CircuitComponent,
  type TerminalProvider,
} from "./terminals.js";

// =============================================================================
// Reference and passives
// =============================================================================

export class Ground implements CircuitComponent {
  readonly kind = "ground";
  readonly isGround = true;
  n = UNASSIGNED_NODE;

  constructor(readonly name = "GND") {}
}

abstract class TwoTerminal implements CircuitComponent {
  abstract readonly kind: string;
  n1 = UNASSIGNED_NODE;
  n2 = UNASSIGNED_NODE;

  constructor(readonly name: string) {}
}

export class Resistor extends TwoTerminal {
  readonly kind = "resistor";

  /** Ohms. */
  constructor(
    name: string,
    readonly resistance = 0,
  ) {
    super(name);
  }
}

export class Capacitor extends TwoTerminal {
  readonly kind = "capacitor";

  /** Farads. */
  constructor(
    name: string,
    readonly capacitance = 0,
  ) {
    super(name);
  }
}

export class Inductor extends TwoTerminal {
  readonly kind = "inductor";

  /** Henries. */
  constructor(
    name: string,
    readonly inductance = 0,
  ) {
    super(name);
  }
}

export class Diode implements CircuitComponent {
  readonly kind = "diode";
  anode = UNASSIGNED_NODE;
  cathode = UNASSIGNED_NODE;

  constructor(readonly name: string) {}
}

// =============================================================================
// Sources and probes
// =============================================================================

/**
 * Base for everything with a positive and a negative terminal. Branch
 * currents reported for these flow internally from nplus to nminus.
 */
abstract class Polarized implements CircuitComponent {
  abstract readonly kind: string;
  nplus = UNASSIGNED_NODE;
  nminus = UNASSIGNED_NODE;

  constructor(readonly name: string) {}
}

export class DCVoltageSource extends Polarized {
  readonly kind = "dc_voltage_source";

  constructor(
    name: string,
    readonly voltage = 0,
  ) {
    super(name);
  }
}

export class DCCurrentSource extends Polarized {
  readonly kind = "dc_current_source";

  constructor(
    name: string,
    readonly current = 0,
  ) {
    super(name);
  }
}

export class ACVoltageSource extends Polarized {
  readonly kind = "ac_voltage_source";

  constructor(
    name: string,
    readonly magnitude = 1,
    readonly phaseDeg = 0,
  ) {
    super(name);
  }
}

export class ACCurrentSource extends Polarized {
  readonly kind = "ac_current_source";

  constructor(
    name: string,
    readonly magnitude = 1,
    readonly phaseDeg = 0,
  ) {
    super(name);
  }
}

/** Numbered port for S-parameter analysis. */
export class PowerSource extends Polarized {
  readonly kind = "power_source";

  constructor(
    name: string,
    readonly portNumber: number,
    readonly impedance = 50,
  ) {
    super(name);
  }
}

export class VoltageProbe extends Polarized {
  readonly kind = "voltage_probe";
}

export class CurrentProbe extends Polarized {
  readonly kind = "current_probe";
}

// =============================================================================
// Dynamic terminals
// =============================================================================

/**
 * Touchstone-backed N-port block: terminals n1..nN plus the `ref` terminal.
 */
export class SParameterFile implements CircuitComponent, TerminalProvider {
  readonly kind = "sparameter_file";
  private readonly terminals: readonly string[];

  constructor(
    readonly name: string,
    readonly numPorts: number,
    readonly file = "",
  ) {
    if (!Number.isInteger(numPorts) || numPorts < 1) {
      throw new RangeError(
        `S-parameter file ${name} needs a positive integer port count, got ${numPorts}`,
      );
    }
    this.terminals = [
      ...Array.from({ length: numPorts }, (_, i) => `n${i + 1}`),
      "ref",
    ];
  }

  terminalNames(): readonly string[] {
    return this.terminals;
  }
}

/**
 * Component with an explicit terminal list, for kinds the library does not
 * model.
 */
export class GenericComponent implements CircuitComponent, TerminalProvider {
  private readonly terminals: readonly string[];

  constructor(
    readonly name: string,
    terminals: readonly string[],
    readonly kind = "generic",
  ) {
    const seen = new Set<string>();
    for (const terminal of terminals) {
      if (seen.has(terminal)) {
        throw new RangeError(`Duplicate terminal '${terminal}' on ${name}`);
      }
      seen.add(terminal);
    }
    this.terminals = [...terminals];
  }

  terminalNames(): readonly string[] {
    return this.terminals;
  }
}

/** Parameter-only block; has no electrical pins. */
export class Substrate implements CircuitComponent {
  readonly kind = "substrate";

  constructor(
    readonly name: string,
    readonly er = 4.5,
    readonly heightM = 1.6e-3,
  ) {}
}
