/**
 * Pin-level queries against a typed result.
 *
 * A bound result pairs a typed result with the circuit it was simulated from,
 * so a voltage can be asked for by component terminal instead of by solver
 * node name. Node ids come from the circuit's node table; node 0 is never
 * looked up in the result.
 */

import { complex, neg, sub, zeros, ZERO, type Complex } from "../complex.js";
import { GROUND_NODE, nodeName, type Circuit } from "../circuit/circuit.js";
import { pin, type CircuitComponent, type Pin } from "../circuit/terminals.js";
import {
  CircuitStructureError,
  CurrentNotAvailableError,
  PinNotConnectedError,
} from "../errors.js";
import {
  getNodeVoltage,
  type ACResult,
  type DCResult,
  type NodalResult,
  type TransientResult,
  type TypedResult,
} from "./typed-results.js";

export interface BoundResult<R extends TypedResult = TypedResult> {
  readonly circuit: Circuit;
  readonly result: R;
}

/** Value shape of a nodal quantity: scalar for DC, per-point otherwise. */
export type NodalValue = number | Complex[] | number[];

/**
 * Pair a result with its circuit. The circuit is resolved first if its node
 * table is stale.
 */
export const bindResult = <R extends TypedResult>(
  circuit: Circuit,
  result: R,
): BoundResult<R> => {
  if (!circuit.isResolved) {
    circuit.resolveNodes();
  }
  return { circuit, result };
};

// =============================================================================
// Sample helpers
// =============================================================================

// Every nodal quantity is handled as a complex sample list internally and
// shaped back to the result's kind on the way out.

const firstLength = (vectors: Readonly<Record<string, readonly unknown[]>>): number => {
  const [first] = Object.values(vectors);
  return first ? first.length : 0;
};

const sweepLength = (result: NodalResult): number => {
  switch (result.kind) {
    case "dc":
      return 1;
    case "ac":
      return result.frequencies.length > 0
        ? result.frequencies.length
        : firstLength(result.voltages);
    case "transient":
      return result.time.length > 0 ? result.time.length : firstLength(result.voltages);
  }
};

const voltageSamples = (result: NodalResult, node: string): Complex[] => {
  switch (result.kind) {
    case "dc":
      return [complex(getNodeVoltage(result, node))];
    case "ac":
      return getNodeVoltage(result, node).map((value) => complex(value.re, value.im));
    case "transient":
      return getNodeVoltage(result, node).map((value) => complex(value));
  }
};

const currentSamples = (result: NodalResult, name: string): Complex[] => {
  if (!(name in result.currents)) {
    throw new CurrentNotAvailableError(name, Object.keys(result.currents).sort());
  }
  switch (result.kind) {
    case "dc":
      return [complex(result.currents[name])];
    case "ac":
      return result.currents[name].map((value) => complex(value.re, value.im));
    case "transient":
      return result.currents[name].map((value) => complex(value));
  }
};

const shape = (result: NodalResult, samples: Complex[]): NodalValue => {
  switch (result.kind) {
    case "dc":
      return samples.length > 0 ? samples[0].re : 0;
    case "ac":
      return samples;
    case "transient":
      return samples.map((value) => value.re);
  }
};

const difference = (a: Complex[], b: Complex[]): Complex[] =>
  a.map((value, index) => sub(value, index < b.length ? b[index] : ZERO));

const pinSamples = (bound: BoundResult<NodalResult>, p: Pin): Complex[] => {
  bound.circuit.assertTerminal(p);
  const node = bound.circuit.nodeOf(p.component, p.terminal);
  if (node === undefined) {
    throw new PinNotConnectedError(p.component.name, p.terminal);
  }
  if (node === GROUND_NODE) {
    return zeros(sweepLength(bound.result));
  }
  return voltageSamples(bound.result, nodeName(node));
};

// =============================================================================
// Voltages
// =============================================================================

export function voltageAtPin(
  bound: BoundResult<DCResult>,
  component: CircuitComponent,
  terminal: string,
): number;
export function voltageAtPin(
  bound: BoundResult<ACResult>,
  component: CircuitComponent,
  terminal: string,
): Complex[];
export function voltageAtPin(
  bound: BoundResult<TransientResult>,
  component: CircuitComponent,
  terminal: string,
): number[];
export function voltageAtPin(
  bound: BoundResult<NodalResult>,
  component: CircuitComponent,
  terminal: string,
): NodalValue;
/**
 * Voltage of the node a terminal is attached to. Grounded terminals read as
 * zero.
 */
export function voltageAtPin(
  bound: BoundResult<NodalResult>,
  component: CircuitComponent,
  terminal: string,
): NodalValue {
  return shape(bound.result, pinSamples(bound, pin(component, terminal)));
}

export function voltageBetween(bound: BoundResult<DCResult>, a: Pin, b: Pin): number;
export function voltageBetween(bound: BoundResult<ACResult>, a: Pin, b: Pin): Complex[];
export function voltageBetween(
  bound: BoundResult<TransientResult>,
  a: Pin,
  b: Pin,
): number[];
export function voltageBetween(bound: BoundResult<NodalResult>, a: Pin, b: Pin): NodalValue;
/** V(a) - V(b) for any two pins. */
export function voltageBetween(bound: BoundResult<NodalResult>, a: Pin, b: Pin): NodalValue {
  return shape(bound.result, difference(pinSamples(bound, a), pinSamples(bound, b)));
}

export function voltageAcross(
  bound: BoundResult<DCResult>,
  component: CircuitComponent,
  a: string,
  b: string,
): number;
export function voltageAcross(
  bound: BoundResult<ACResult>,
  component: CircuitComponent,
  a: string,
  b: string,
): Complex[];
export function voltageAcross(
  bound: BoundResult<TransientResult>,
  component: CircuitComponent,
  a: string,
  b: string,
): number[];
export function voltageAcross(
  bound: BoundResult<NodalResult>,
  component: CircuitComponent,
  a: string,
  b: string,
): NodalValue;
/** Voltage between two terminals of one component. */
export function voltageAcross(
  bound: BoundResult<NodalResult>,
  component: CircuitComponent,
  a: string,
  b: string,
): NodalValue {
  return voltageBetween(bound, pin(component, a), pin(component, b));
}

// =============================================================================
// Currents
// =============================================================================

export function currentThrough(bound: BoundResult<DCResult>, component: CircuitComponent): number;
export function currentThrough(
  bound: BoundResult<ACResult>,
  component: CircuitComponent,
): Complex[];
export function currentThrough(
  bound: BoundResult<TransientResult>,
  component: CircuitComponent,
): number[];
export function currentThrough(
  bound: BoundResult<NodalResult>,
  component: CircuitComponent,
): NodalValue;
/**
 * Branch current of a component, flowing internally from its first terminal
 * to its second. Only sources and current probes report one.
 */
export function currentThrough(
  bound: BoundResult<NodalResult>,
  component: CircuitComponent,
): NodalValue {
  return shape(bound.result, currentSamples(bound.result, component.name));
}

export function currentIntoPin(
  bound: BoundResult<DCResult>,
  component: CircuitComponent,
  terminal: string,
): number;
export function currentIntoPin(
  bound: BoundResult<ACResult>,
  component: CircuitComponent,
  terminal: string,
): Complex[];
export function currentIntoPin(
  bound: BoundResult<TransientResult>,
  component: CircuitComponent,
  terminal: string,
): number[];
export function currentIntoPin(
  bound: BoundResult<NodalResult>,
  component: CircuitComponent,
  terminal: string,
): NodalValue;
/**
 * Current entering the component at a terminal: the branch current at the
 * first terminal, its negation at the second.
 */
export function currentIntoPin(
  bound: BoundResult<NodalResult>,
  component: CircuitComponent,
  terminal: string,
): NodalValue {
  bound.circuit.assertTerminal(pin(component, terminal));
  const terminals = bound.circuit.terminalsOf(component);
  const position = terminals.indexOf(terminal);
  if (position > 1) {
    throw new CircuitStructureError(
      `Current into ${component.name}.${terminal} is not defined: only ${terminals.slice(0, 2).join(" and ")} carry the branch current`,
      component.name,
      terminal,
    );
  }
  const samples = currentSamples(bound.result, component.name);
  return shape(bound.result, position === 0 ? samples : samples.map(neg));
}

/**
 * DC power of a component: V(pos) - V(neg) times its branch current.
 * Swapping `pos` and `negative` flips the sign.
 */
export const componentPower = (
  bound: BoundResult<DCResult>,
  component: CircuitComponent,
  pos: string,
  negative: string,
): number =>
  voltageAcross(bound, component, pos, negative) * currentThrough(bound, component);
