import { Heading, Velocity } from '../components'
import type { SimulationContext } from '../types'

export function velocitySystem(ctx: SimulationContext) {
  const { speed } = ctx.config
  ctx.agents.forEach((entity) => {
    const angle = Heading.angle[entity]
    Velocity.x[entity] = Math.cos(angle) * speed
    Velocity.y[entity] = Math.sin(angle) * speed
  })
}
