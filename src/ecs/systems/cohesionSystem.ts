import { Heading, Position } from '../components'
import { commitHeadings, createPendingHeadings } from '../pending'
import { blendToward } from '../steering'
import type { SimulationContext } from '../types'

import { distance } from '@/utils/math'

export function cohesionSystem(ctx: SimulationContext) {
  const { cohesionDistance, cohesionSensitivity, boidSize } = ctx.config
  const pending = createPendingHeadings()

  ctx.agents.forEach((entity, id) => {
    const mePos = { x: Position.x[entity], y: Position.y[entity] }
    let sumX = 0
    let sumY = 0
    let count = 0

    ctx.agents.forEach((otherEntity, otherId) => {
      if (otherId === id) return
      const otherPos = { x: Position.x[otherEntity], y: Position.y[otherEntity] }
      if (!(distance(mePos, otherPos) - boidSize < cohesionDistance)) return
      sumX += otherPos.x
      sumY += otherPos.y
      count++
    })

    if (count === 0) return
    const avgX = sumX / count
    const avgY = sumY / count
    const towardCenter = Math.atan2(avgY - mePos.y, avgX - mePos.x)
    pending.set(id, blendToward(Heading.angle[entity], towardCenter, cohesionSensitivity))
  })

  commitHeadings(ctx, pending)
}
