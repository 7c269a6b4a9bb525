import { EventEmitter } from 'events';
import { NodeState } from '../types';
import { ClusterformError } from '../common/errors';

/**
 * Formation lifecycle of one node.
 *
 * ```
 * Booting → NetworkConfigured → ServiceStarting → Joined → Ready
 *    └────────────┴──────────────────┴────────────┴────────┴──→ Failed
 * ```
 *
 * Only the next state or Failed may be entered. Failed is terminal.
 */
export const VALID_TRANSITIONS: Record<NodeState, readonly NodeState[]> = {
  [NodeState.BOOTING]: [NodeState.NETWORK_CONFIGURED, NodeState.FAILED],
  [NodeState.NETWORK_CONFIGURED]: [NodeState.SERVICE_STARTING, NodeState.FAILED],
  [NodeState.SERVICE_STARTING]: [NodeState.JOINED, NodeState.FAILED],
  [NodeState.JOINED]: [NodeState.READY, NodeState.FAILED],
  [NodeState.READY]: [NodeState.FAILED],
  [NodeState.FAILED]: []
};

export function isValidTransition(from: NodeState, to: NodeState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export class InvalidTransitionError extends ClusterformError {
  readonly name = 'InvalidTransitionError' as const;
  readonly code = 'INVALID_TRANSITION';

  constructor(readonly node: string, readonly from: NodeState, readonly to: NodeState) {
    super(`Invalid transition for ${node}: ${from} → ${to}`);
  }
}

export interface StateTransition {
  from: NodeState;
  to: NodeState;
  timestamp: number;
  reason?: string;
}

/**
 * Emits 'transition' with a StateTransition and the node name.
 */
export class NodeStateMachine extends EventEmitter {
  private current: NodeState = NodeState.BOOTING;
  private readonly transitions: StateTransition[] = [];

  constructor(readonly node: string, private readonly clock: () => number = Date.now) {
    super();
  }

  get state(): NodeState {
    return this.current;
  }

  transition(to: NodeState, reason?: string): void {
    const from = this.current;
    if (!isValidTransition(from, to)) {
      throw new InvalidTransitionError(this.node, from, to);
    }
    const record: StateTransition = reason === undefined
      ? { from, to, timestamp: this.clock() }
      : { from, to, timestamp: this.clock(), reason };
    this.current = to;
    this.transitions.push(record);
    this.emit('transition', record, this.node);
  }

  /** Enter Failed unless already there */
  fail(reason: string): void {
    if (this.current !== NodeState.FAILED) {
      this.transition(NodeState.FAILED, reason);
    }
  }

  /** Whether the node has passed through (or is in) the given state */
  hasReached(state: NodeState): boolean {
    return this.current === state || this.transitions.some(t => t.to === state);
  }

  history(): StateTransition[] {
    return this.transitions.slice();
  }
}
