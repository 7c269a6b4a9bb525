// Main entry point for the clusterform library

// Types
export * from './types';

// Common
export * from './common/errors';
export * from './common/logger';
export * from './common/PhaseTimeline';
export * from './retry/RetryManager';

// Configuration
export * from './config/OrchestratorConfig';
export * from './config/YamlClusterConfiguration';

// Topology
export * from './topology/types';
export * from './topology/TopologyProfile';
export * from './topology/parse';
export * from './topology/presets';

// Network configuration
export * from './network/commands';
export * from './network/strategies';
export * from './network/NetworkConfigurator';

// Fleet
export * from './fleet/types';
export * from './fleet/CommandRunner';
export * from './fleet/CommandFleetManager';
export * from './fleet/SimulatedFleet';
export { SimulatedHost } from './fleet/simulation/SimulatedHost';
export { SimulatedCluster, SimulatedClusterOptions } from './fleet/simulation/SimulatedCluster';

// Formation
export * from './formation/types';
export * from './formation/NodeStateMachine';
export * from './formation/ClusterToken';
export * from './formation/ServiceProfile';
export * from './formation/NodeRegistry';
export * from './formation/ClusterFormationDriver';
export * from './formation/phases';

// Verification and diagnostics
export * from './health/parsers';
export * from './health/HealthVerifier';
export * from './diagnostics/DiagnosticsCollector';
export * from './diagnostics/ChaosInjector';

// Orchestration
export * from './orchestrator/Orchestrator';
export * from './orchestrator/ScenarioScript';
export * from './orchestrator/ResilienceScenario';
