/**
 * Circuit graph and net resolution.
 *
 * Components and pins are indexed into small integers as they are first seen,
 * and the union-find runs over pin indices only. resolveNodes() rebuilds the
 * node table from scratch on every call.
 */

import { CircuitStructureError } from "../errors.js";
import { UnionFind } from "./union-find.js";
import {
  discoverTerminals,
  isGroundComponent,
  type CircuitComponent,
  type Pin,
} from "./terminals.js";

/** Node id reserved for ground. */
export const GROUND_NODE = 0;

/**
 * Solver-side name of a node id.
 */
export const nodeName = (node: number): string =>
  node === GROUND_NODE ? "gnd" : `_net${node}`;

/** One resolved net and the pins on it. */
export interface Net {
  node: number;
  name: string;
  pins: Pin[];
}

interface ComponentEntry {
  component: CircuitComponent;
  index: number;
  terminals: readonly string[];
}

export class Circuit {
  private entries: ComponentEntry[] = [];
  private indexByComponent: Map<CircuitComponent, number> = new Map();
  private pinIndex: Map<string, number> = new Map();
  private uf = new UnionFind();
  private nodeTable: Map<string, number> = new Map();
  private resolved = false;

  /** Components in insertion order. */
  get components(): CircuitComponent[] {
    return this.entries.map((entry) => entry.component);
  }

  /**
   * Whether resolveNodes() has run since the last structural change. Any
   * addComponent() or connect() that changes the graph discards the node table.
   */
  get isResolved(): boolean {
    return this.resolved;
  }

  has(component: CircuitComponent): boolean {
    return this.indexByComponent.has(component);
  }

  /**
   * Add a component unless this exact instance is already present.
   */
  addComponent<T extends CircuitComponent>(component: T): T {
    if (!this.indexByComponent.has(component)) {
      const index = this.entries.length;
      this.entries.push({
        component,
        index,
        terminals: discoverTerminals(component),
      });
      this.indexByComponent.set(component, index);
      this.invalidate();
    }
    return component;
  }

  /**
   * Join two pins into one net, adding their components as needed.
   * Both terminals are checked before anything is changed.
   */
  connect(a: Pin, b: Pin): void {
    this.assertTerminal(a);
    this.assertTerminal(b);
    this.addComponent(a.component);
    this.addComponent(b.component);
    const keyA = this.pinKey(a);
    const keyB = this.pinKey(b);
    if (this.uf.connected(keyA, keyB)) return;
    this.uf.union(keyA, keyB);
    this.invalidate();
  }

  /**
   * Terminals of a component, whether or not it belongs to this circuit.
   */
  terminalsOf(component: CircuitComponent): readonly string[] {
    const index = this.indexByComponent.get(component);
    if (index !== undefined) {
      return this.entries[index].terminals;
    }
    return discoverTerminals(component);
  }

  /**
   * Assign node ids to every net: 0 for nets touching a ground component,
   * 1..N for the rest in first-seen order. Returns the number of distinct
   * node ids.
   */
  resolveNodes(): number {
    const rootOrder: number[] = [];
    const seenRoots = new Set<number>();
    const groundRoots = new Set<number>();

    for (const entry of this.entries) {
      const ground = isGroundComponent(entry.component);
      for (const terminal of entry.terminals) {
        const root = this.uf.find(this.pinKeyFor(entry.index, terminal));
        if (!seenRoots.has(root)) {
          seenRoots.add(root);
          rootOrder.push(root);
        }
        if (ground) {
          groundRoots.add(root);
        }
      }
    }

    const nodeByRoot = new Map<number, number>();
    let nextNode = 1;
    for (const root of rootOrder) {
      if (groundRoots.has(root)) {
        nodeByRoot.set(root, GROUND_NODE);
      } else {
        nodeByRoot.set(root, nextNode++);
      }
    }

    this.nodeTable = new Map();
    for (const entry of this.entries) {
      for (const terminal of entry.terminals) {
        const root = this.uf.find(this.pinKeyFor(entry.index, terminal));
        const node = nodeByRoot.get(root);
        if (node !== undefined) {
          this.nodeTable.set(slotKey(entry.index, terminal), node);
        }
      }
    }

    this.resolved = true;
    return nextNode - 1 + (groundRoots.size > 0 ? 1 : 0);
  }

  /**
   * Resolved node id of a terminal, or undefined when the circuit has changed
   * since the last resolveNodes() or never contained the component.
   */
  nodeOf(component: CircuitComponent, terminal: string): number | undefined {
    const index = this.indexByComponent.get(component);
    if (index === undefined) return undefined;
    return this.nodeTable.get(slotKey(index, terminal));
  }

  /**
   * Resolved nets ordered by node id.
   */
  nets(): Net[] {
    const byNode = new Map<number, Pin[]>();
    for (const entry of this.entries) {
      for (const terminal of entry.terminals) {
        const node = this.nodeTable.get(slotKey(entry.index, terminal));
        if (node === undefined) continue;
        if (!byNode.has(node)) {
          byNode.set(node, []);
        }
        byNode.get(node)?.push({ component: entry.component, terminal });
      }
    }
    return Array.from(byNode.entries())
      .sort(([a], [b]) => a - b)
      .map(([node, pins]) => ({ node, name: nodeName(node), pins }));
  }

  /**
   * Whether two pins are currently in the same net (no resolution needed).
   */
  sameNet(a: Pin, b: Pin): boolean {
    this.assertTerminal(a);
    this.assertTerminal(b);
    const keyA = this.existingPinKey(a);
    const keyB = this.existingPinKey(b);
    if (keyA === undefined || keyB === undefined) {
      return a.component === b.component && a.terminal === b.terminal;
    }
    return this.uf.connected(keyA, keyB);
  }

  /** Throw unless the pin's terminal exists on its component. */
  assertTerminal(p: Pin): void {
    const terminals = this.terminalsOf(p.component);
    if (!terminals.includes(p.terminal)) {
      const known = terminals.length > 0 ? terminals.join(", ") : "none";
      throw new CircuitStructureError(
        `Component ${p.component.name} (${p.component.kind}) has no terminal '${p.terminal}'. Available terminals: ${known}`,
        p.component.name,
        p.terminal,
      );
    }
  }

  private invalidate(): void {
    this.nodeTable = new Map();
    this.resolved = false;
  }

  private pinKey(p: Pin): number {
    const index = this.indexByComponent.get(p.component);
    if (index === undefined) {
      throw new CircuitStructureError(
        `Component ${p.component.name} is not part of this circuit`,
        p.component.name,
        p.terminal,
      );
    }
    return this.pinKeyFor(index, p.terminal);
  }

  private existingPinKey(p: Pin): number | undefined {
    const index = this.indexByComponent.get(p.component);
    if (index === undefined) return undefined;
    return this.pinIndex.get(slotKey(index, p.terminal));
  }

  private pinKeyFor(componentIndex: number, terminal: string): number {
    const key = slotKey(componentIndex, terminal);
    let id = this.pinIndex.get(key);
    if (id === undefined) {
      id = this.pinIndex.size;
      this.pinIndex.set(key, id);
    }
    return id;
  }
}

const slotKey = (componentIndex: number, terminal: string): string =>
  `${componentIndex}:${terminal}`;
