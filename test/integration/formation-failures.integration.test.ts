import * as path from 'path';
import { NodeState } from '../../src/types';
import { TimelineEntry } from '../../src/common/PhaseTimeline';
import {
  FormationAbortedError,
  FormationError,
  FormationTimeoutError,
  MissingAddressError,
  NetworkApplyError,
  ScriptAssertionError
} from '../../src/common/errors';
import { exitCodeFor } from '../../src/orchestrator/Orchestrator';
import { loadPreset, loadProfileFile, presetDirectory } from '../../src/topology/presets';
import { createRunHarness, fastConfig } from '../harness/simulatedRun';

describe('Formation failures', () => {
  it('rejects a profile missing an address before booting anything', async () => {
    const vlan = await loadPreset('vlan');
    const addresses = { ...vlan.addresses };
    delete addresses['agent-1'];
    const { orchestrator, fleet } = await createRunHarness('vlan', { profile: { ...vlan, addresses } });

    const report = await orchestrator.run();

    expect(report.error).toBeInstanceOf(MissingAddressError);
    expect(report.error?.message).toBe("Node agent-1 has no address for semantic interface 'cluster'");
    expect(fleet.bootedNodes()).toEqual([]);
    expect(report.diagnostics).toEqual([]);
    expect(exitCodeFor(report)).toBe(2);
  });

  it('stops at the first failing network command and collects diagnostics for that node', async () => {
    const { orchestrator, fleet } = await createRunHarness('vlan', { fleetOptions: { availableModules: ['bonding'] } });

    const report = await orchestrator.run();

    expect(report.error).toBeInstanceOf(NetworkApplyError);
    expect(report.error?.message).toBe("Network configuration failed on server-1: 'modprobe 8021q || lsmod | grep -q '^8021q'' exited 1");
    expect(report.nodeStates).toEqual({
      'server-1': NodeState.FAILED,
      'server-2': NodeState.BOOTING,
      'agent-1': NodeState.BOOTING
    });
    expect(report.diagnostics.map(bundle => bundle.node)).toEqual(['server-1']);
    const [bundle] = report.diagnostics;
    expect(bundle?.errorCode).toBe('NETWORK_APPLY');
    expect(bundle?.transcript.map(entry => entry.exitCode)).toEqual([0, 0, 1]);
    expect(fleet.runningNodes()).toEqual([]);
    expect(exitCodeFor(report)).toBe(1);
  });

  it('times out a node that never boots and tears the others down', async () => {
    const { orchestrator, fleet } = await createRunHarness('flat', {
      config: fastConfig({ timeouts: { bootMs: 100 } }),
      fleetOptions: { neverBoot: ['agent-1'] }
    });

    const report = await orchestrator.run();

    expect(report.error).toBeInstanceOf(FormationTimeoutError);
    expect(report.error?.message).toBe("agent-1 did not reach 'boot' within 100ms");
    expect(report.nodeStates['agent-1']).toBe(NodeState.FAILED);
    expect(report.diagnostics.map(bundle => bundle.node)).toEqual(['agent-1']);
    expect(fleet.runningNodes()).toEqual([]);
  });

  it('fails the node that never reports Ready', async () => {
    const { orchestrator } = await createRunHarness('flat', {
      config: fastConfig({ timeouts: { nodeReadyMs: 100 } }),
      fleetOptions: { neverReady: ['agent-1'] }
    });

    const report = await orchestrator.run();

    expect(report.error).toBeInstanceOf(FormationTimeoutError);
    expect(report.error?.message).toBe("agent-1 did not reach 'Ready in the node registry' within 100ms");
    expect(report.nodeStates).toEqual({
      'server-1': NodeState.READY,
      'server-2': NodeState.READY,
      'agent-1': NodeState.FAILED
    });
    const bundle = report.diagnostics.find(candidate => candidate.node === 'agent-1');
    expect(bundle?.probes.find(probe => probe.probe === 'env /etc/default/k3s-agent')?.output).toContain('K3S_TOKEN=<redacted>');
  });

  it('aborts when the global timeout expires', async () => {
    const { orchestrator, fleet } = await createRunHarness('flat', {
      config: fastConfig({ globalTimeoutMs: 50, timeouts: { bootMs: 60000 } }),
      fleetOptions: { neverBoot: ['server-2'] }
    });

    const report = await orchestrator.run();

    expect(report.timedOut).toBe(true);
    expect(report.error).toBeInstanceOf(FormationAbortedError);
    expect(report.verdict).toBe('fail');
    expect(fleet.runningNodes()).toEqual([]);
  });

  it('honours an external abort', async () => {
    const controller = new AbortController();
    const { orchestrator } = await createRunHarness('flat', {
      fleetOptions: { neverBoot: ['server-1'] },
      signal: controller.signal
    });
    setTimeout(() => controller.abort(), 20);

    const report = await orchestrator.run();

    expect(report.timedOut).toBe(false);
    expect(report.error).toBeInstanceOf(FormationAbortedError);
  });

  it('fails formation when the joining nodes tag their segments differently from the primary', async () => {
    const profile = await loadProfileFile(path.join(presetDirectory(), 'negative', 'vlan-mismatch.yaml'));
    const { orchestrator } = await createRunHarness('vlan', { profile });

    const report = await orchestrator.run();

    expect(report.error).toBeInstanceOf(FormationError);
    expect(report.error?.message.split('\n')[0]).toBe(
      'start k3s-server failed on server-2 (exit 1): Job for k3s-server.service failed because the control process exited with error code.'
    );
    expect(report.nodeStates['server-1']).toBe(NodeState.READY);
    expect(report.nodeStates['server-2']).toBe(NodeState.FAILED);
    const bundle = report.diagnostics.find(candidate => candidate.node === 'server-2');
    expect(bundle?.probes.find(probe => probe.probe === 'k3s-server log')?.output).toContain(
      'k3s-server[1]: level=fatal msg="failed to contact server at https://192.168.200.1:6443: connection timed out"'
    );
    expect(report.health).toBeUndefined();
    expect(exitCodeFor(report)).toBe(1);
  });

  it('stops the health checks once the run is aborted', async () => {
    const controller = new AbortController();
    const { orchestrator, timeline } = await createRunHarness('flat', { signal: controller.signal });
    timeline.on('entry', (entry: TimelineEntry) => {
      if (entry.phase === 'health' && entry.event === 'started') controller.abort();
    });

    const report = await orchestrator.run();

    expect(report.error).toBeInstanceOf(FormationAbortedError);
    expect(report.error?.message).toBe("Wait for 'health checks' on server-1 was aborted");
    expect(report.health).toBeUndefined();
    expect(timeline.forPhase('health').map(entry => entry.event)).toEqual(['started', 'failed']);
    expect(report.verdict).toBe('fail');
  });

  it('stops the script once the run is aborted', async () => {
    const controller = new AbortController();
    const { orchestrator, timeline } = await createRunHarness('flat', {
      signal: controller.signal,
      script: [{ name: 'hostname', node: '*', command: 'hostname', expectExitCode: 0 }]
    });
    timeline.on('entry', (entry: TimelineEntry) => {
      if (entry.phase === 'script' && entry.event === 'started') controller.abort();
    });

    const report = await orchestrator.run();

    expect(report.error).toBeInstanceOf(FormationAbortedError);
    expect(report.error?.message).toBe("Wait for 'script check hostname' on server-1 was aborted");
    expect(report.health?.passed).toBe(true);
    expect(report.script).toBeUndefined();
  });

  it('fails the run on a script check and collects diagnostics for its node', async () => {
    const { orchestrator } = await createRunHarness('flat', {
      script: [
        { name: 'hostname', node: '*', command: 'hostname', expectExitCode: 0 },
        { name: 'coredns', node: 'agent-1', command: 'k3s kubectl -n kube-system get pods', expectExitCode: 0, expectContains: 'coredns' }
      ]
    });

    const report = await orchestrator.run();

    expect(report.error).toBeInstanceOf(ScriptAssertionError);
    expect(report.script?.filter(result => result.passed).map(result => result.node)).toEqual(['server-1', 'server-2', 'agent-1']);
    expect(report.script?.find(result => !result.passed)).toMatchObject({ check: 'coredns', node: 'agent-1' });
    expect(report.health?.passed).toBe(true);
    expect(report.diagnostics.map(bundle => bundle.node)).toEqual(['agent-1']);
    expect(exitCodeFor(report)).toBe(1);
  });

  it('rejects script checks aimed at nodes outside the run', async () => {
    const { orchestrator, fleet } = await createRunHarness('flat', {
      script: [{ name: 'ghost', node: 'agent-7', command: 'true', expectExitCode: 0 }]
    });

    const report = await orchestrator.run();

    expect(report.error?.message).toBe("Script check 'ghost' targets unknown node agent-7");
    expect(fleet.bootedNodes()).toEqual([]);
    expect(exitCodeFor(report)).toBe(2);
  });
});
