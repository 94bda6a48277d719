import { createWorldFromSnapshot, snapshotWorld } from '../src/ecs/world'
import type { SimulationContext } from '../src/ecs/types'
import { DEFAULT_WORLD_CONFIG, SNAPSHOT_VERSION, type AgentState, type WorldConfig } from '../src/types/sim'

export interface StagedBoid {
  x: number
  y: number
  heading: number
}

export function testConfig(patch: Partial<WorldConfig> = {}): WorldConfig {
  return {
    ...DEFAULT_WORLD_CONFIG,
    rngSeed: 42,
    population: 0,
    ...patch,
    bounds: { ...(patch.bounds ?? DEFAULT_WORLD_CONFIG.bounds) },
  }
}

// Boids get ids 1..n in the order given, which is also the order every rule scans them.
export function stageWorld(boids: StagedBoid[], patch: Partial<WorldConfig> = {}): SimulationContext {
  return createWorldFromSnapshot({
    version: SNAPSHOT_VERSION,
    config: testConfig(patch),
    tick: 0,
    agents: boids.map((boid, index) => ({
      id: index + 1,
      position: { x: boid.x, y: boid.y },
      velocity: { x: 0, y: 0 },
      heading: boid.heading,
    })),
    stats: { agents: 0, meanHeading: 0, polarization: 0, centroid: { x: 0, y: 0 }, outOfBounds: 0 },
  })
}

export function agentById(ctx: SimulationContext, id: number): AgentState {
  const agent = snapshotWorld(ctx).agents.find((candidate) => candidate.id === id)
  if (!agent) throw new Error(`Agent ${id} missing`)
  return agent
}
