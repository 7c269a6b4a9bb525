import { FormationPhase } from '../types';
import { BootPhase } from './BootPhase';
import { NetworkPhase } from './NetworkPhase';
import { PreparePhase } from './PreparePhase';
import { PrimaryInitPhase } from './PrimaryInitPhase';
import { TokenPhase } from './TokenPhase';
import { ServerJoinPhase } from './ServerJoinPhase';
import { AgentJoinPhase } from './AgentJoinPhase';
import { ClusterReadyPhase } from './ClusterReadyPhase';

export function defaultPhases(retry?: { attempts: number; settleDelayMs: number }): FormationPhase[] {
  return [
    new BootPhase(),
    new NetworkPhase(),
    new PreparePhase(),
    new PrimaryInitPhase(),
    new TokenPhase(retry),
    new ServerJoinPhase(),
    new AgentJoinPhase(),
    new ClusterReadyPhase()
  ];
}

export {
  BootPhase,
  NetworkPhase,
  PreparePhase,
  PrimaryInitPhase,
  TokenPhase,
  ServerJoinPhase,
  AgentJoinPhase,
  ClusterReadyPhase
};
