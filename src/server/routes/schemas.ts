import type { Context } from 'hono'
import { z } from 'zod'
import { provisioningStateSchema } from '../config'
import { BadRequestError } from '../services/errors'

export const DEFAULT_NAMESPACE = 'default'

// DNS-label style names, as the platform object store requires
const objectName = z.string().min(1).max(253).regex(/^[a-z0-9]([-a-z0-9.]*[a-z0-9])?$/, 'must be a lower-case DNS name')

const metaSchema = z.object({
  namespace: objectName.default(DEFAULT_NAMESPACE),
  name: objectName,
})

const resourceVersion = z.string().min(1)

export const attachmentSpecSchema = z.object({
  mode: z.string(),
  nativeVLAN: z.number().int(),
  allowedVLANs: z.array(z.number().int()).optional(),
  mtu: z.number().int().optional(),
})

export const createAttachmentSchema = metaSchema.extend({ spec: attachmentSpecSchema })
export const updateAttachmentSchema = z.object({ resourceVersion, spec: attachmentSpecSchema })

const interfaceRefSchema = z.object({
  name: z.string().min(1).optional(),
  macAddress: z.string().min(1).optional(),
  attachment: z.object({
    name: z.string().min(1),
    namespace: z.string().min(1).optional(),
  }),
}).refine(ref => (ref.name === undefined) !== (ref.macAddress === undefined), {
  message: 'an interface is identified by exactly one of name or macAddress',
})

export const hostSpecSchema = z.object({
  bootMACAddress: z.string().min(1).optional(),
  bmc: z.object({
    driver: z.string().min(1),
    address: z.string().min(1),
  }).optional(),
  networkInterfaces: z.array(interfaceRefSchema).default([]),
})

export const createHostSchema = metaSchema.extend({
  spec: hostSpecSchema,
  provisioningState: provisioningStateSchema.default('registering'),
})
export const updateHostSchema = z.object({ resourceVersion, spec: hostSpecSchema })

const nicSchema = z.object({
  name: z.string(),
  mac: z.string(),
  ip: z.string().optional(),
  pxe: z.boolean().default(false),
  lldp: z.object({
    switchID: z.string().optional(),
    portID: z.string().optional(),
    switchSystemName: z.string().optional(),
  }).optional(),
})

// Facts reported by the provisioning state machine and by inspection
export const hostStatusPatchSchema = z.object({
  resourceVersion: resourceVersion.optional(),
  provisioningState: provisioningStateSchema.optional(),
  hardwareDetails: z.object({ nics: z.array(nicSchema) }).nullable().optional(),
})

export const switchSpecSchema = z.object({
  address: z.string().min(1),
  macAddress: z.string().min(1),
  deviceType: z.string().min(1),
  driver: z.string().min(1).optional(),
  port: z.number().int().min(1).max(65535).optional(),
  disableCertificateVerification: z.boolean().optional(),
  credentials: z.object({
    type: z.enum(['password', 'publickey']).default('password'),
    secretName: z.string().min(1),
  }),
})

export const createSwitchSchema = metaSchema.extend({ spec: switchSpecSchema })
export const updateSwitchSchema = z.object({ resourceVersion, spec: switchSpecSchema })

const base64 = z.string().regex(/^[A-Za-z0-9+/]*={0,2}$/, 'must be base64')
const secretDataSchema = z.record(base64)

export const createSecretSchema = metaSchema.extend({ data: secretDataSchema.default({}) })
export const updateSecretSchema = z.object({ resourceVersion, data: secretDataSchema })

// Parses a JSON request body, answering 400 on malformed JSON or shape errors
export async function readBody<T extends z.ZodTypeAny>(c: Context, schema: T): Promise<z.output<T>> {
  let body: unknown
  try {
    body = await c.req.json()
  } catch {
    throw new BadRequestError('Request body must be valid JSON')
  }

  const parsed = schema.safeParse(body)
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)
    throw new BadRequestError('Invalid request body', details)
  }
  return parsed.data
}
