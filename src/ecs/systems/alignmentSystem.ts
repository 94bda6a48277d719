import { Heading, Position } from '../components'
import { commitHeadings, createPendingHeadings } from '../pending'
import { blendToward } from '../steering'
import type { SimulationContext } from '../types'

import { distance } from '@/utils/math'

// Runs even at zero sensitivity so every tick does the same work in the same order.
export function alignmentSystem(ctx: SimulationContext) {
  const { alignmentDistance, alignmentSensitivity, boidSize } = ctx.config
  const pending = createPendingHeadings()

  ctx.agents.forEach((entity, id) => {
    const mePos = { x: Position.x[entity], y: Position.y[entity] }
    let sumHeading = 0
    let count = 0

    ctx.agents.forEach((otherEntity, otherId) => {
      if (otherId === id) return
      const dist = distance(mePos, { x: Position.x[otherEntity], y: Position.y[otherEntity] }) - boidSize
      if (!(dist < alignmentDistance)) return
      sumHeading += Heading.angle[otherEntity]
      count++
    })

    if (count === 0) return
    const target = sumHeading / count
    pending.set(id, blendToward(Heading.angle[entity], target, alignmentSensitivity))
  })

  commitHeadings(ctx, pending)
}
