export interface Vector2 {
  x: number
  y: number
}

export const SNAPSHOT_VERSION = 1

export interface WorldConfig {
  // Width (x) and height (y) of the world rectangle, centered on the origin.
  bounds: Vector2
  boidSize: number
  population: number
  speed: number
  separationDistance: number
  separationSensitivity: number
  alignmentDistance: number
  alignmentSensitivity: number
  cohesionDistance: number
  cohesionSensitivity: number
  // The reference boundary rule never checks the right edge; this turns a fourth check on.
  avoidRightEdge: boolean
  // Pause between ticks in the loop. Not part of the per-tick result.
  timeStepMs: number
  rngSeed: number
}

export interface AgentState {
  id: number
  position: Vector2
  velocity: Vector2
  heading: number
}

export interface RenderAgent {
  id: number
  position: Vector2
  heading: number
}

export interface RenderFrame {
  tick: number
  agents: RenderAgent[]
}

export interface FlockStats {
  agents: number
  meanHeading: number
  // Length of the mean unit heading vector: 1 when every agent points the same way.
  polarization: number
  centroid: Vector2
  outOfBounds: number
}

export interface SimulationSnapshot {
  version: number
  config: WorldConfig
  tick: number
  agents: AgentState[]
  stats: FlockStats
}

export interface ControlState {
  paused: boolean
  maxTicks: number | null
}

export const DEFAULT_WORLD_CONFIG: WorldConfig = {
  bounds: { x: 960, y: 540 },
  boidSize: 15,
  population: 30,
  speed: 3,
  separationDistance: 50,
  separationSensitivity: 0.1,
  alignmentDistance: 70,
  alignmentSensitivity: 0,
  cohesionDistance: 100,
  cohesionSensitivity: 0,
  avoidRightEdge: false,
  timeStepMs: 20,
  rngSeed: Date.now(),
}

export const DEFAULT_CONTROLS: ControlState = {
  paused: false,
  maxTicks: null,
}
