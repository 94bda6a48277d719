import { Heading } from './components'
import type { SimulationContext } from './types'

/**
 * Heading updates computed by a rule's read pass, keyed by agent id.
 *
 * A rule fills this while reading component state as it stood when the rule
 * started, then drains it in one commit pass. Writing the same id twice keeps
 * only the last value.
 */
export type PendingHeadings = Map<number, number>

export function createPendingHeadings(): PendingHeadings {
  return new Map()
}

export function commitHeadings(ctx: SimulationContext, pending: PendingHeadings) {
  pending.forEach((heading, id) => {
    const entity = ctx.agents.get(id)
    if (entity === undefined) return
    Heading.angle[entity] = heading
  })
  pending.clear()
}
