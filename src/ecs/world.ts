import { createWorld } from 'bitecs'

import {
  createRegistry,
  despawnBoidEntity,
  renderBoidEntity,
  serializeBoidEntity,
  spawnBoidEntity,
} from './registry'
import type { PhaseTimings, SimulationContext } from './types'
import { summarizeFlock } from './analytics'
import { separationSystem } from './systems/separationSystem'
import { alignmentSystem } from './systems/alignmentSystem'
import { cohesionSystem } from './systems/cohesionSystem'
import { boundarySystem } from './systems/boundarySystem'
import { velocitySystem } from './systems/velocitySystem'
import { positionSystem } from './systems/positionSystem'

import type { RenderAgent, SimulationSnapshot, WorldConfig } from '@/types/sim'
import { SNAPSHOT_VERSION } from '@/types/sim'
import { parseWorldConfig } from '@/config/worldConfig'
import { parseAgentId } from '@/config/snapshot'
import { mulberry32, randRange } from '@/utils/rand'
import { TAU } from '@/utils/math'
import { createLogger } from '@/utils/log'

const log = createLogger('world')

const now = () => (typeof performance !== 'undefined' ? performance.now() : Date.now())

function createContext(config: WorldConfig): SimulationContext {
  const world = createWorld()
  const registry = createRegistry(world)
  return {
    world,
    registry,
    config,
    tick: 0,
    rng: mulberry32(config.rngSeed),
    agents: new Map(),
    nextAgentId: 1,
  }
}

function cloneConfig(config: WorldConfig): WorldConfig {
  return {
    ...config,
    bounds: { ...config.bounds },
  }
}

export function initWorld(config: WorldConfig): SimulationContext {
  const ctx = createContext(cloneConfig(parseWorldConfig(config)))
  spawnInitialPopulation(ctx)
  log.debug(`spawned ${ctx.agents.size} boids (seed ${ctx.config.rngSeed})`)
  return ctx
}

export function createWorldFromSnapshot(snapshot: SimulationSnapshot): SimulationContext {
  if (snapshot.version !== SNAPSHOT_VERSION) {
    throw new Error('Snapshot version mismatch')
  }
  const ctx = createContext(cloneConfig(parseWorldConfig(snapshot.config)))
  ctx.tick = snapshot.tick

  snapshot.agents.forEach((agent) => {
    const id = parseAgentId(agent.id)
    if (ctx.agents.has(id)) {
      throw new Error(`Duplicate agent id ${id} in snapshot`)
    }
    const entity = spawnBoidEntity(ctx.registry, agent)
    ctx.agents.set(id, entity)
    ctx.nextAgentId = Math.max(ctx.nextAgentId, id + 1)
  })
  return ctx
}

// The random source is read only here: x, y, then heading for each boid.
function spawnInitialPopulation(ctx: SimulationContext) {
  const { bounds, population } = ctx.config
  for (let i = 0; i < population; i++) {
    const id = ctx.nextAgentId++
    const position = {
      x: randRange(ctx.rng, 0, bounds.x) - bounds.x / 2,
      y: randRange(ctx.rng, 0, bounds.y) - bounds.y / 2,
    }
    const heading = randRange(ctx.rng, 0, TAU)
    const entity = spawnBoidEntity(ctx.registry, { id, position, velocity: { x: 0, y: 0 }, heading })
    ctx.agents.set(id, entity)
  }
}

export function stepWorld(ctx: SimulationContext): PhaseTimings {
  const timings: PhaseTimings = {}
  const measure = <T>(label: string, fn: () => T): T => {
    const start = now()
    const result = fn()
    timings[label] = (timings[label] ?? 0) + (now() - start)
    return result
  }

  measure('separation', () => separationSystem(ctx))
  measure('alignment', () => alignmentSystem(ctx))
  measure('cohesion', () => cohesionSystem(ctx))
  measure('boundary', () => boundarySystem(ctx))
  measure('velocity', () => velocitySystem(ctx))
  measure('position', () => positionSystem(ctx))

  ctx.tick++
  return timings
}

export function runTicks(ctx: SimulationContext, count: number): PhaseTimings {
  const combined: PhaseTimings = {}
  for (let i = 0; i < count; i++) {
    const timings = stepWorld(ctx)
    Object.entries(timings).forEach(([label, value]) => {
      combined[label] = (combined[label] ?? 0) + value
    })
  }
  return combined
}

export function renderView(ctx: SimulationContext): RenderAgent[] {
  return Array.from(ctx.agents.values()).map((entity) => renderBoidEntity(entity))
}

export function snapshotWorld(ctx: SimulationContext): SimulationSnapshot {
  return {
    version: SNAPSHOT_VERSION,
    config: cloneConfig(ctx.config),
    tick: ctx.tick,
    agents: Array.from(ctx.agents.values()).map((entity) => serializeBoidEntity(entity)),
    stats: summarizeFlock(ctx),
  }
}

export function disposeWorld(ctx: SimulationContext) {
  ctx.agents.forEach((entity) => despawnBoidEntity(ctx.registry, entity))
  ctx.agents.clear()
}
