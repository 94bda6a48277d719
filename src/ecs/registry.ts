import { addComponent, addEntity, removeEntity } from 'bitecs'
import type { IWorld } from 'bitecs'

import { AgentMeta, Heading, Position, Velocity } from './components'

import type { AgentState, RenderAgent } from '@/types/sim'

export interface EntityRegistry {
  world: IWorld
}

export function createRegistry(world: IWorld): EntityRegistry {
  return {
    world,
  }
}

export function spawnBoidEntity(registry: EntityRegistry, state: AgentState): number {
  const entity = addEntity(registry.world)
  addComponent(registry.world, Position, entity)
  addComponent(registry.world, Velocity, entity)
  addComponent(registry.world, Heading, entity)
  addComponent(registry.world, AgentMeta, entity)

  hydrateBoidEntity(entity, state)
  return entity
}

export function hydrateBoidEntity(entity: number, state: AgentState) {
  Position.x[entity] = state.position.x
  Position.y[entity] = state.position.y
  Velocity.x[entity] = state.velocity.x
  Velocity.y[entity] = state.velocity.y
  Heading.angle[entity] = state.heading
  AgentMeta.id[entity] = state.id
}

export function despawnBoidEntity(registry: EntityRegistry, entity: number) {
  removeEntity(registry.world, entity)
}

export function serializeBoidEntity(entity: number): AgentState {
  return {
    id: AgentMeta.id[entity],
    position: { x: Position.x[entity], y: Position.y[entity] },
    velocity: { x: Velocity.x[entity], y: Velocity.y[entity] },
    heading: Heading.angle[entity],
  }
}

export function renderBoidEntity(entity: number): RenderAgent {
  return {
    id: AgentMeta.id[entity],
    position: { x: Position.x[entity], y: Position.y[entity] },
    heading: Heading.angle[entity],
  }
}
