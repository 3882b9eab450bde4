/**
 * Build circuits from JSON circuit descriptions.
 */

import { readFile } from "fs/promises";
import { CircuitStructureError, NetbindError } from "../errors.js";
import { Circuit } from "./circuit.js";
import {
  ACCurrentSource,
  ACVoltageSource,
  Capacitor,
  CurrentProbe,
  DCCurrentSource,
  DCVoltageSource,
  Diode,
  GenericComponent,
  Ground,
  Inductor,
  PowerSource,
  Resistor,
  SParameterFile,
  Substrate,
  VoltageProbe,
} from "./components.js";
import {
  CircuitDescriptionSchema,
  type CircuitDescription,
  type ComponentSpec,
} from "./schemas.js";
import type { CircuitComponent, Pin } from "./terminals.js";

/** A circuit plus its components by name. */
export interface BuiltCircuit {
  circuit: Circuit;
  components: Map<string, CircuitComponent>;
}

export class CircuitDescriptionError extends NetbindError {}

/**
 * Instantiate one component from its description entry.
 */
export const createComponent = (spec: ComponentSpec): CircuitComponent => {
  switch (spec.kind) {
    case "ground":
      return new Ground(spec.name);
    case "resistor":
      return new Resistor(spec.name, spec.value);
    case "capacitor":
      return new Capacitor(spec.name, spec.value);
    case "inductor":
      return new Inductor(spec.name, spec.value);
    case "diode":
      return new Diode(spec.name);
    case "dc_voltage_source":
      return new DCVoltageSource(spec.name, spec.value);
    case "dc_current_source":
      return new DCCurrentSource(spec.name, spec.value);
    case "ac_voltage_source":
      return new ACVoltageSource(spec.name, spec.value);
    case "ac_current_source":
      return new ACCurrentSource(spec.name, spec.value);
    case "voltage_probe":
      return new VoltageProbe(spec.name);
    case "current_probe":
      return new CurrentProbe(spec.name);
    case "substrate":
      return new Substrate(spec.name, spec.value);
    case "power_source":
      return new PowerSource(spec.name, spec.port, spec.impedance);
    case "sparameter_file":
      return new SParameterFile(spec.name, spec.ports, spec.file);
    case "generic":
      return new GenericComponent(spec.name, spec.terminals);
  }
};

/**
 * Validate unknown JSON as a circuit description.
 */
export const parseCircuitDescription = (data: unknown): CircuitDescription => {
  const result = CircuitDescriptionSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new CircuitDescriptionError(`Invalid circuit description: ${issues}`);
  }
  return result.data;
};

/**
 * Look up a component of a built circuit by name.
 */
export const getComponent = (built: BuiltCircuit, name: string): CircuitComponent => {
  const component = built.components.get(name);
  if (!component) {
    const available = Array.from(built.components.keys()).sort();
    throw new CircuitStructureError(
      `Component '${name}' not found. Available: ${available.join(", ")}`,
      name,
    );
  }
  return component;
};

/**
 * Resolve `NAME.terminal` (or bare `NAME`, meaning the first terminal).
 */
export const resolvePinRef = (
  built: BuiltCircuit,
  ref: string,
): Pin => {
  const dot = ref.indexOf(".");
  const name = dot === -1 ? ref : ref.slice(0, dot);
  const terminal = dot === -1 ? undefined : ref.slice(dot + 1);
  const component = getComponent(built, name);
  if (terminal !== undefined) {
    return { component, terminal };
  }
  const first = built.circuit.terminalsOf(component)[0];
  if (first === undefined) {
    throw new CircuitStructureError(
      `Component ${name} has no terminals to connect`,
      name,
    );
  }
  return { component, terminal: first };
};

/**
 * Build and resolve a circuit from a validated description.
 */
export const buildCircuit = (description: CircuitDescription): BuiltCircuit => {
  const built: BuiltCircuit = { circuit: new Circuit(), components: new Map() };

  for (const spec of description.components) {
    const component = createComponent(spec);
    built.circuit.addComponent(component);
    built.components.set(spec.name, component);
  }

  for (const [a, b] of description.connections) {
    built.circuit.connect(resolvePinRef(built, a), resolvePinRef(built, b));
  }

  built.circuit.resolveNodes();
  return built;
};

/**
 * Read, validate and build a circuit description file.
 */
export const loadCircuitFile = async (filePath: string): Promise<BuiltCircuit> => {
  const content = await readFile(filePath, "utf-8");
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CircuitDescriptionError(`Circuit file is not valid JSON: ${message}`);
  }
  return buildCircuit(parseCircuitDescription(data));
};
