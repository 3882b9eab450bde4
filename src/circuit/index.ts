/**
 * Circuit graph, component kinds and net resolution.
 */

export { Circuit, GROUND_NODE, nodeName, type Net } from "./circuit.js";
export { UnionFind } from "./union-find.js";
export {
  UNASSIGNED_NODE,
  TERMINAL_ALIASES,
  discoverTerminals,
  formatPin,
  isGroundComponent,
  isTerminalName,
  isTerminalProvider,
  pin,
  type CircuitComponent,
  type Pin,
  type TerminalProvider,
} from "./terminals.js";
export {
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
export {
  CircuitDescriptionError,
  buildCircuit,
  createComponent,
  getComponent,
  loadCircuitFile,
  parseCircuitDescription,
  resolvePinRef,
  type BuiltCircuit,
} from "./description.js";
export {
  CircuitDescriptionSchema,
  ComponentSpecSchema,
  type CircuitDescription,
  type ComponentSpec,
} from "./schemas.js";
