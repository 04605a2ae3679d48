import { z } from 'zod'
import { MAX_VLAN, MIN_VLAN, VlanRanges } from './vlan'

export * from './fsm'
export * from './stp'
export * from './vlan'

// Common schemas
export const uuidSchema = z
  .string()
  .uuid()
  .transform((value) => value.toLowerCase())
  .brand<'Uuid'>()

/** Canonical lower-case UUID text. */
export type Uuid = z.infer<typeof uuidSchema>

/**
 * A Date (an absolute instant) or ISO-8601 text. Text without an offset is a
 * naive timestamp and is refused when written.
 */
export const timestampInputSchema = z.union([z.date(), z.string()])

export type TimestampInput = z.infer<typeof timestampInputSchema>

export const vlanSchema = z.number().int().min(MIN_VLAN).max(MAX_VLAN)

export const vlanRangesSchema = z.string().superRefine((value, ctx) => {
  try {
    VlanRanges.parse(value)
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: error instanceof Error ? error.message : `Invalid VLAN ranges "${value}"`,
    })
  }
})

/** Bandwidth in Mbps. */
export const bandwidthSchema = z.number().int().nonnegative()

export const directionalityValues = ['BI_DIRECTIONAL', 'UNI_DIRECTIONAL'] as const

export const directionalitySchema = z.enum(directionalityValues)

export type Directionality = z.infer<typeof directionalitySchema>

// Reservation
export const endpointSchema = z.object({
  domain: z.string().min(1),
  networkType: z.string().min(1),
  /** Port name, matches `ports.name`. */
  port: z.string().min(1),
  /** Requested VLAN(s), possibly a range such as `"1-10"`. */
  vlans: vlanRangesSchema,
})

export type EndpointInput = z.input<typeof endpointSchema>

export const reservationInputSchema = z.object({
  // header
  protocolVersion: z.string().min(1),
  correlationId: uuidSchema,
  requesterNsa: z.string().min(1),
  providerNsa: z.string().min(1),
  replyTo: z.string().nullable().optional(),
  sessionSecurityAttributes: z.string().nullable().optional(),
  // request message
  globalReservationId: z.string(),
  description: z.string().nullable().optional(),
  // criteria
  version: z.number().int().nonnegative().default(0),
  startTime: timestampInputSchema.optional(),
  endTime: timestampInputSchema.optional(),
  // p2p
  bandwidth: bandwidthSchema,
  directionality: directionalitySchema.default('BI_DIRECTIONAL'),
  symmetric: z.boolean(),
  source: endpointSchema,
  destination: endpointSchema,
})

export type ReservationInput = z.input<typeof reservationInputSchema>

export const parameterInputSchema = z.object({
  key: z.string().min(1),
  value: z.string().nullable(),
})

// Path trace
export const segmentInputSchema = z.object({
  /** NSA identifier of the uPA handling this segment. */
  segmentId: z.string().min(1),
  /** Connection id issued by that uPA. */
  upaConnectionId: z.string().min(1),
  /** Fully qualified STP identifiers in hop order. */
  stps: z.array(z.string().min(1)).default([]),
})

export type SegmentInput = z.input<typeof segmentInputSchema>

export const pathInputSchema = z.object({
  segments: z.array(segmentInputSchema).default([]),
})

export const pathTraceInputSchema = z.object({
  /** NSA identifier of the root aggregator. */
  pathTraceId: z.string().min(1),
  agConnectionId: z.string().min(1),
  paths: z.array(pathInputSchema).default([]),
})

export type PathTraceInput = z.input<typeof pathTraceInputSchema>

// Port
export const portInputSchema = z.object({
  /** Subscription id of the port in the orchestrator. */
  portId: uuidSchema,
  name: z.string().min(1),
  vlans: vlanRangesSchema,
  remoteStp: z.string().nullable().optional(),
  bandwidth: bandwidthSchema,
  enabled: z.boolean().default(true),
})

export type PortInput = z.input<typeof portInputSchema>

// Connection
export const connectionInputSchema = z.object({
  connectionId: uuidSchema,
  bandwidth: bandwidthSchema,
  sourcePortId: uuidSchema,
  sourceVlan: vlanSchema,
  destPortId: uuidSchema,
  destVlan: vlanSchema,
  /** Subscription id of the deployed lightpath. */
  subscriptionId: uuidSchema,
})

export type ConnectionInput = z.input<typeof connectionInputSchema>
