import { Position, Velocity } from '../components'
import type { SimulationContext } from '../types'

// Explicit Euler step. Positions are not clamped to the world rectangle.
export function positionSystem(ctx: SimulationContext) {
  ctx.agents.forEach((entity) => {
    Position.x[entity] += Velocity.x[entity]
    Position.y[entity] += Velocity.y[entity]
  })
}
