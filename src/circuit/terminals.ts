/**
 * Component contract and terminal discovery.
 *
 * A component's terminals come from its TerminalProvider implementation when
 * it has one. Otherwise they are the component's own numeric properties whose
 * names follow the terminal naming convention (n, n1, n2, nplus, ...).
 */

/**
 * Placeholder value of a declared terminal property. Resolved node ids are
 * kept by the Circuit, never written into the component.
 */
export const UNASSIGNED_NODE = 0;

/**
 * Anything that can be placed in a circuit. Identity is the object itself.
 */
export interface CircuitComponent {
  readonly name: string;
  readonly kind: string;
  /** Every terminal of a ground component resolves to node 0. */
  readonly isGround?: boolean;
}

/**
 * Capability for components whose terminals are not plain named properties,
 * e.g. N-port data files whose arity is fixed at construction.
 */
export interface TerminalProvider {
  terminalNames(): readonly string[];
}

/** One terminal of one component instance. */
export interface Pin {
  readonly component: CircuitComponent;
  readonly terminal: string;
}

export const pin = (component: CircuitComponent, terminal: string): Pin => ({
  component,
  terminal,
});

export const formatPin = (p: Pin): string => `${p.component.name}.${p.terminal}`;

/** Semantic terminal names accepted by the property scanner. */
export const TERMINAL_ALIASES: ReadonlySet<string> = new Set([
  "nplus",
  "nminus",
  "anode",
  "cathode",
  "gate",
  "drain",
  "source",
  "collector",
  "base",
  "emitter",
  "input",
  "output",
  "bulk",
  "t1",
  "t2",
]);

const NUMBERED_TERMINAL = /^n\d*$/;

export const isTerminalName = (name: string): boolean =>
  NUMBERED_TERMINAL.test(name) || TERMINAL_ALIASES.has(name);

export const isTerminalProvider = (
  component: object,
): component is TerminalProvider =>
  "terminalNames" in component &&
  typeof component.terminalNames === "function";

export const isGroundComponent = (component: CircuitComponent): boolean =>
  component.isGround === true;

/**
 * List a component's terminals in declaration order.
 */
export const discoverTerminals = (
  component: CircuitComponent,
): readonly string[] => {
  if (isTerminalProvider(component)) {
    return component.terminalNames();
  }
  return Object.entries(component)
    .filter(([name, value]) => typeof value === "number" && isTerminalName(name))
    .map(([name]) => name);
};
