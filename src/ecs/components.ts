import { Types, defineComponent } from 'bitecs'

// f64 storage keeps committed headings and positions bit-for-bit equal to the values the rules compute.
export const Position = defineComponent({
  x: Types.f64,
  y: Types.f64,
})

// Derived from Heading every tick by the velocity system.
export const Velocity = defineComponent({
  x: Types.f64,
  y: Types.f64,
})

// The persistent steering state. Never wrapped back into [0, 2pi).
export const Heading = defineComponent({
  angle: Types.f64,
})

export const AgentMeta = defineComponent({
  id: Types.ui32,
})
