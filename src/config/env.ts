import { parseWorldConfig } from './worldConfig'

import { DEFAULT_CONTROLS, DEFAULT_WORLD_CONFIG, type ControlState, type WorldConfig } from '@/types/sim'

type Env = Record<string, string | undefined>

const processEnv: Env = typeof process !== 'undefined' ? process.env : {}

const parseFlag = (value: string | undefined, fallback = false) =>
  value === undefined ? fallback : value === '1' || value === 'true'

// Leaves a malformed value in place so validation reports it instead of falling back silently.
const parseNumber = (value: string | undefined, fallback: number) =>
  value === undefined || value.trim() === '' ? fallback : Number(value)

export function worldConfigFromEnv(env: Env = processEnv, base: WorldConfig = DEFAULT_WORLD_CONFIG): WorldConfig {
  return parseWorldConfig({
    bounds: {
      x: parseNumber(env.FLOCK_WIDTH, base.bounds.x),
      y: parseNumber(env.FLOCK_HEIGHT, base.bounds.y),
    },
    boidSize: parseNumber(env.FLOCK_BOID_SIZE, base.boidSize),
    population: parseNumber(env.FLOCK_POPULATION, base.population),
    speed: parseNumber(env.FLOCK_SPEED, base.speed),
    separationDistance: parseNumber(env.FLOCK_SEPARATION_DISTANCE, base.separationDistance),
    separationSensitivity: parseNumber(env.FLOCK_SEPARATION_SENSITIVITY, base.separationSensitivity),
    alignmentDistance: parseNumber(env.FLOCK_ALIGNMENT_DISTANCE, base.alignmentDistance),
    alignmentSensitivity: parseNumber(env.FLOCK_ALIGNMENT_SENSITIVITY, base.alignmentSensitivity),
    cohesionDistance: parseNumber(env.FLOCK_COHESION_DISTANCE, base.cohesionDistance),
    cohesionSensitivity: parseNumber(env.FLOCK_COHESION_SENSITIVITY, base.cohesionSensitivity),
    avoidRightEdge: parseFlag(env.FLOCK_AVOID_RIGHT_EDGE, base.avoidRightEdge),
    timeStepMs: parseNumber(env.FLOCK_TIME_STEP_MS, base.timeStepMs),
    rngSeed: parseNumber(env.FLOCK_SEED, base.rngSeed),
  })
}

export function controlsFromEnv(env: Env = processEnv): ControlState {
  const maxTicks = env.FLOCK_MAX_TICKS
  return {
    ...DEFAULT_CONTROLS,
    paused: parseFlag(env.FLOCK_PAUSED, DEFAULT_CONTROLS.paused),
    maxTicks: maxTicks === undefined || maxTicks.trim() === '' ? DEFAULT_CONTROLS.maxTicks : Math.max(0, Math.floor(Number(maxTicks)) || 0),
  }
}

export function logEveryFromEnv(env: Env = processEnv, fallback = 50): number {
  const value = Math.floor(parseNumber(env.FLOCK_LOG_EVERY, fallback))
  return Number.isFinite(value) && value > 0 ? value : fallback
}
