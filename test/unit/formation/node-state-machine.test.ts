import { NodeState } from '../../../src/types';
import { InvalidTransitionError, NodeStateMachine, StateTransition, isValidTransition } from '../../../src/formation/NodeStateMachine';

const HAPPY_PATH = [NodeState.NETWORK_CONFIGURED, NodeState.SERVICE_STARTING, NodeState.JOINED, NodeState.READY];

describe('NodeStateMachine', () => {
  it('walks the formation path in order', () => {
    const machine = new NodeStateMachine('server-1', () => 42);
    const seen: Array<[StateTransition, string]> = [];
    machine.on('transition', (transition: StateTransition, node: string) => seen.push([transition, node]));

    HAPPY_PATH.forEach(state => machine.transition(state));

    expect(machine.state).toBe(NodeState.READY);
    expect(seen.map(([transition]) => `${transition.from}->${transition.to}`)).toEqual([
      'Booting->NetworkConfigured',
      'NetworkConfigured->ServiceStarting',
      'ServiceStarting->Joined',
      'Joined->Ready'
    ]);
    expect(seen[0]).toEqual([{ from: NodeState.BOOTING, to: NodeState.NETWORK_CONFIGURED, timestamp: 42 }, 'server-1']);
  });

  it('cannot skip the network step', () => {
    const machine = new NodeStateMachine('agent-1');
    expect(() => machine.transition(NodeState.SERVICE_STARTING)).toThrow(InvalidTransitionError);
    expect(() => machine.transition(NodeState.SERVICE_STARTING))
      .toThrow('Invalid transition for agent-1: Booting → ServiceStarting');
    expect(machine.state).toBe(NodeState.BOOTING);
  });

  it('never goes backwards', () => {
    const machine = new NodeStateMachine('server-2');
    HAPPY_PATH.slice(0, 3).forEach(state => machine.transition(state));
    expect(() => machine.transition(NodeState.NETWORK_CONFIGURED)).toThrow(InvalidTransitionError);
  });

  it('reaches Ready only through NetworkConfigured and ServiceStarting', () => {
    const machine = new NodeStateMachine('server-1');
    HAPPY_PATH.forEach(state => machine.transition(state));

    const order = machine.history().map(transition => transition.to);
    expect(order.indexOf(NodeState.NETWORK_CONFIGURED)).toBeLessThan(order.indexOf(NodeState.SERVICE_STARTING));
    expect(order.indexOf(NodeState.SERVICE_STARTING)).toBeLessThan(order.indexOf(NodeState.READY));
    expect(machine.hasReached(NodeState.JOINED)).toBe(true);
  });

  it('can fail from any live state, and Failed is terminal', () => {
    for (const stop of [0, 1, 2, 3, 4]) {
      const machine = new NodeStateMachine('n');
      HAPPY_PATH.slice(0, stop).forEach(state => machine.transition(state));
      machine.fail('boom');
      expect(machine.state).toBe(NodeState.FAILED);
    }

    const failed = new NodeStateMachine('n');
    failed.fail('first');
    failed.fail('second');
    expect(failed.history()).toHaveLength(1);
    expect(failed.history()[0]?.reason).toBe('first');
    expect(isValidTransition(NodeState.FAILED, NodeState.BOOTING)).toBe(false);
  });
});
