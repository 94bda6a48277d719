import assert from 'node:assert/strict'

import { controlsFromEnv, logEveryFromEnv, worldConfigFromEnv } from '../src/config/env'
import { InvalidConfigError, parseWorldConfig } from '../src/config/worldConfig'
import { DEFAULT_WORLD_CONFIG } from '../src/types/sim'

assert.deepEqual(parseWorldConfig(DEFAULT_WORLD_CONFIG), DEFAULT_WORLD_CONFIG)

{
  const error = captureConfigError({ ...DEFAULT_WORLD_CONFIG, population: -1 })
  assert.equal(error.issues.length, 1)
  assert.ok(error.issues[0].startsWith('population: '), error.issues[0])
}

{
  const error = captureConfigError({ ...DEFAULT_WORLD_CONFIG, bounds: { x: 0, y: 540 }, speed: Number.NaN })
  assert.deepEqual(
    error.issues.map((issue) => issue.split(':')[0]),
    ['bounds.x', 'speed'],
  )
}

assert.throws(() => parseWorldConfig(null), InvalidConfigError)

// Environment overrides on top of the defaults.
{
  const config = worldConfigFromEnv({
    FLOCK_POPULATION: '12',
    FLOCK_AVOID_RIGHT_EDGE: 'true',
    FLOCK_SEED: '5',
    FLOCK_COHESION_SENSITIVITY: '0.02',
    FLOCK_WIDTH: '',
  })
  assert.deepEqual(config, {
    ...DEFAULT_WORLD_CONFIG,
    population: 12,
    avoidRightEdge: true,
    rngSeed: 5,
    cohesionSensitivity: 0.02,
  })
}

assert.equal(worldConfigFromEnv({ FLOCK_AVOID_RIGHT_EDGE: '1' }).avoidRightEdge, true)
assert.equal(worldConfigFromEnv({ FLOCK_AVOID_RIGHT_EDGE: 'yes' }).avoidRightEdge, false)
assert.throws(() => worldConfigFromEnv({ FLOCK_SPEED: 'fast' }), /speed/)
assert.throws(() => worldConfigFromEnv({ FLOCK_POPULATION: '-3' }), InvalidConfigError)

assert.deepEqual(controlsFromEnv({}), { paused: false, maxTicks: null })
assert.deepEqual(controlsFromEnv({ FLOCK_MAX_TICKS: '25', FLOCK_PAUSED: 'true' }), { paused: true, maxTicks: 25 })
assert.deepEqual(controlsFromEnv({ FLOCK_MAX_TICKS: 'soon' }), { paused: false, maxTicks: 0 })

assert.equal(logEveryFromEnv({}), 50)
assert.equal(logEveryFromEnv({ FLOCK_LOG_EVERY: '10' }), 10)
assert.equal(logEveryFromEnv({ FLOCK_LOG_EVERY: '0' }), 50)

function captureConfigError(input: unknown): InvalidConfigError {
  try {
    parseWorldConfig(input)
  } catch (error) {
    if (error instanceof InvalidConfigError) return error
    throw error
  }
  throw new Error('Expected config to be rejected')
}

console.log('world config test passed')
