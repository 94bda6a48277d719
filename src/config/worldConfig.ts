import { z } from 'zod'

import type { WorldConfig } from '@/types/sim'

const finite = () => z.number().finite()

export const worldConfigSchema = z.object({
  bounds: z.object({
    x: finite().positive(),
    y: finite().positive(),
  }),
  boidSize: finite().nonnegative(),
  population: z.number().int().nonnegative(),
  speed: finite(),
  separationDistance: finite(),
  separationSensitivity: finite(),
  alignmentDistance: finite(),
  alignmentSensitivity: finite(),
  cohesionDistance: finite(),
  cohesionSensitivity: finite(),
  avoidRightEdge: z.boolean(),
  timeStepMs: finite().nonnegative(),
  rngSeed: finite(),
})

export class InvalidConfigError extends Error {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid world config: ${issues.join('; ')}`)
    this.name = 'InvalidConfigError'
    this.issues = issues
  }
}

export function parseWorldConfig(input: unknown): WorldConfig {
  const result = worldConfigSchema.safeParse(input)
  if (!result.success) {
    throw new InvalidConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    )
  }
  return result.data
}
