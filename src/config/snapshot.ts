import { z } from 'zod'

// AgentMeta.id is a ui32 component; anything else would be stored as a different number.
export const agentIdSchema = z.number().int().min(1).max(0xffffffff)

// Positions and headings are not checked: a world that hit a zero-distance singularity holds
// Infinity/NaN and must still reload as it was.
export function parseAgentId(id: unknown): number {
  const result = agentIdSchema.safeParse(id)
  if (!result.success) {
    throw new Error(`Invalid agent id ${String(id)} in snapshot`)
  }
  return result.data
}
