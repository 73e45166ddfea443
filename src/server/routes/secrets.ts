import { Hono } from 'hono'
import type { Secret, SecretData } from '../services/types'
import { createSecretSchema, readBody, updateSecretSchema } from './schemas'

export const secretsRoutes = new Hono()

function decodeData(data: Record<string, string>): SecretData {
  const out: SecretData = {}
  for (const [key, value] of Object.entries(data)) {
    out[key] = Buffer.from(value, 'base64')
  }
  return out
}

// Values go over the wire base64-encoded
export function toSecretResponse(secret: Secret) {
  const data: Record<string, string> = {}
  for (const [key, value] of Object.entries(secret.data)) {
    data[key] = value.toString('base64')
  }
  return {
    namespace: secret.namespace,
    name: secret.name,
    resourceVersion: secret.resourceVersion,
    createdAt: secret.createdAt,
    data,
  }
}

secretsRoutes.get('/', async (c) => {
  const { store } = c.get('services')
  const namespace = c.req.query('namespace')
  const secrets = await store.list('secrets', namespace || undefined)
  return c.json(secrets.map(toSecretResponse))
})

secretsRoutes.get('/:namespace/:name', async (c) => {
  const { store } = c.get('services')
  const secret = await store.get('secrets', c.req.param('namespace'), c.req.param('name'))
  return c.json(toSecretResponse(secret))
})

secretsRoutes.post('/', async (c) => {
  const { store } = c.get('services')
  const body = await readBody(c, createSecretSchema)
  const created = await store.create('secrets', {
    namespace: body.namespace,
    name: body.name,
    data: decodeData(body.data),
  })
  return c.json(toSecretResponse(created), 201)
})

secretsRoutes.put('/:namespace/:name', async (c) => {
  const { store } = c.get('services')
  const body = await readBody(c, updateSecretSchema)

  const current = await store.get('secrets', c.req.param('namespace'), c.req.param('name'))
  const updated = await store.update('secrets', {
    ...current,
    resourceVersion: body.resourceVersion,
    data: decodeData(body.data),
  })
  return c.json(toSecretResponse(updated))
})

secretsRoutes.delete('/:namespace/:name', async (c) => {
  const { store } = c.get('services')
  await store.delete('secrets', c.req.param('namespace'), c.req.param('name'))
  return c.json({ success: true })
})
