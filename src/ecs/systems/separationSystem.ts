import { Heading, Position } from '../components'
import { commitHeadings, createPendingHeadings } from '../pending'
import { blendAway, distanceWeight } from '../steering'
import type { SimulationContext } from '../types'

import { distance } from '@/utils/math'

export function separationSystem(ctx: SimulationContext) {
  const { separationDistance, separationSensitivity, boidSize } = ctx.config
  const threshold = separationDistance + boidSize
  const pending = createPendingHeadings()

  ctx.agents.forEach((entity, id) => {
    const mePos = { x: Position.x[entity], y: Position.y[entity] }
    const heading = Heading.angle[entity]

    ctx.agents.forEach((otherEntity, otherId) => {
      if (otherId === id) return
      const otherPos = { x: Position.x[otherEntity], y: Position.y[otherEntity] }
      const dist = distance(mePos, otherPos)
      // A NaN distance is never within the threshold.
      if (!(dist < threshold)) return

      const away = Math.atan2(mePos.y - otherPos.y, mePos.x - otherPos.x) + Math.PI
      // Each close neighbour replaces the previous one's update; the last one scanned wins.
      pending.set(id, blendAway(heading, away, distanceWeight(separationSensitivity, dist)))
    })
  })

  commitHeadings(ctx, pending)
}
