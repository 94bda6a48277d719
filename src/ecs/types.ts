import type { IWorld } from 'bitecs'

import type { WorldConfig } from '@/types/sim'
import type { RNG } from '@/utils/rand'
import type { EntityRegistry } from './registry'

export interface SimulationContext {
  world: IWorld
  registry: EntityRegistry
  config: WorldConfig
  tick: number
  rng: RNG
  // Agent id -> bitecs entity. Insertion order is the iteration order of every rule.
  agents: Map<number, number>
  nextAgentId: number
}

export type PhaseTimings = Record<string, number>
