import assert from 'node:assert/strict'

import { InvalidConfigError } from '../src/config/worldConfig'
import { createWorldFromSnapshot, disposeWorld, initWorld, renderView, snapshotWorld } from '../src/ecs/world'
import { SNAPSHOT_VERSION } from '../src/types/sim'
import { distance } from '../src/utils/math'
import { mulberry32, randRange } from '../src/utils/rand'
import { stageWorld, testConfig } from './fixtures'

assert.equal(distance({ x: 0, y: 0 }, { x: 3, y: 4 }), 5)
assert.equal(distance({ x: -1, y: 2 }, { x: -1, y: 2 }), 0)

// Setup: dense ids, positions inside the world, headings in [0, 2pi), zero velocity.
{
  const ctx = initWorld(testConfig({ population: 30, rngSeed: 7 }))
  const { agents } = snapshotWorld(ctx)
  assert.deepEqual(
    agents.map((agent) => agent.id),
    Array.from({ length: 30 }, (_, index) => index + 1),
  )
  agents.forEach((agent) => {
    assert.ok(agent.position.x >= -480 && agent.position.x < 480, `x out of range: ${agent.position.x}`)
    assert.ok(agent.position.y >= -270 && agent.position.y < 270, `y out of range: ${agent.position.y}`)
    assert.ok(agent.heading >= 0 && agent.heading < Math.PI * 2, `heading out of range: ${agent.heading}`)
    assert.deepEqual(agent.velocity, { x: 0, y: 0 })
  })
  assert.equal(ctx.nextAgentId, 31)
}

// The random source is drawn x, y, heading per boid.
{
  const ctx = initWorld(testConfig({ population: 2, rngSeed: 99 }))
  const rng = mulberry32(99)
  const expected = [1, 2].map((id) => {
    const x = randRange(rng, 0, 960) - 480
    const y = randRange(rng, 0, 540) - 270
    const heading = randRange(rng, 0, Math.PI * 2)
    return { id, position: { x, y }, velocity: { x: 0, y: 0 }, heading }
  })
  assert.deepEqual(snapshotWorld(ctx).agents, expected)
}

// Same seed, same world.
{
  const a = snapshotWorld(initWorld(testConfig({ population: 12, rngSeed: 5 })))
  const b = snapshotWorld(initWorld(testConfig({ population: 12, rngSeed: 5 })))
  const c = snapshotWorld(initWorld(testConfig({ population: 12, rngSeed: 6 })))
  assert.deepEqual(a.agents, b.agents)
  assert.notDeepEqual(a.agents, c.agents)
}

assert.equal(initWorld(testConfig({ population: 0 })).agents.size, 0)
assert.throws(() => initWorld(testConfig({ population: -1 })), InvalidConfigError)
assert.throws(() => initWorld(testConfig({ population: 2.5 })), InvalidConfigError)

// The render view is a copy.
{
  const ctx = stageWorld([{ x: 10, y: 20, heading: 1.5 }])
  const view = renderView(ctx)
  assert.deepEqual(view, [{ id: 1, position: { x: 10, y: 20 }, heading: 1.5 }])
  view[0].position.x = 9999
  view[0].heading = 0
  assert.deepEqual(renderView(ctx), [{ id: 1, position: { x: 10, y: 20 }, heading: 1.5 }])
}

// Snapshots round-trip through a fresh context, tick included.
{
  const ctx = initWorld(testConfig({ population: 8, rngSeed: 21 }))
  const snapshot = { ...snapshotWorld(ctx), tick: 17 }
  const reloaded = createWorldFromSnapshot(snapshot)
  assert.equal(reloaded.tick, 17)
  assert.equal(reloaded.nextAgentId, 9)
  assert.deepEqual(snapshotWorld(reloaded), snapshot)
}

// Rejected snapshots.
{
  const snapshot = snapshotWorld(stageWorld([{ x: 0, y: 0, heading: 0 }]))
  assert.throws(() => createWorldFromSnapshot({ ...snapshot, version: SNAPSHOT_VERSION + 1 }), /Snapshot version mismatch/)
  assert.throws(
    () => createWorldFromSnapshot({ ...snapshot, agents: [snapshot.agents[0], snapshot.agents[0]] }),
    /Duplicate agent id 1/,
  )
  for (const id of [0, -1, 1.5, 2 ** 32]) {
    assert.throws(
      () => createWorldFromSnapshot({ ...snapshot, agents: [{ ...snapshot.agents[0], id }] }),
      /Invalid agent id/,
      `id ${id} should be rejected`,
    )
  }
}

// Non-finite kinematics reload unchanged.
{
  const snapshot = snapshotWorld(stageWorld([{ x: Number.NaN, y: 4, heading: Infinity }]))
  const reloaded = snapshotWorld(createWorldFromSnapshot(snapshot))
  assert.ok(Number.isNaN(reloaded.agents[0].position.x))
  assert.equal(reloaded.agents[0].position.y, 4)
  assert.equal(reloaded.agents[0].heading, Infinity)
}

// Disposing empties the store.
{
  const ctx = initWorld(testConfig({ population: 4, rngSeed: 1 }))
  disposeWorld(ctx)
  assert.equal(ctx.agents.size, 0)
  assert.deepEqual(renderView(ctx), [])
}

console.log('agent store test passed')
