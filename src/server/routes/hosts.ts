import { Hono } from 'hono'
import type { Host } from '../services/types'
import { createHostSchema, hostStatusPatchSchema, readBody, updateHostSchema } from './schemas'

export const hostsRoutes = new Hono()

hostsRoutes.get('/', async (c) => {
  const { store } = c.get('services')
  const namespace = c.req.query('namespace')
  return c.json(await store.list('hosts', namespace || undefined))
})

hostsRoutes.get('/:namespace/:name', async (c) => {
  const { store } = c.get('services')
  return c.json(await store.get('hosts', c.req.param('namespace'), c.req.param('name')))
})

// Create host; the host controller picks it up from the store watch
hostsRoutes.post('/', async (c) => {
  const { store } = c.get('services')
  const body = await readBody(c, createHostSchema)

  const host: Host = {
    namespace: body.namespace,
    name: body.name,
    spec: body.spec,
    status: {
      provisioningState: body.provisioningState,
      conditions: [],
    },
  }

  return c.json(await store.create('hosts', host), 201)
})

// Replace host spec
hostsRoutes.put('/:namespace/:name', async (c) => {
  const { store } = c.get('services')
  const body = await readBody(c, updateHostSchema)

  const current = await store.get('hosts', c.req.param('namespace'), c.req.param('name'))
  return c.json(await store.update('hosts', { ...current, resourceVersion: body.resourceVersion, spec: body.spec }))
})

// Provisioning state and inspection results
hostsRoutes.put('/:namespace/:name/status', async (c) => {
  const { store } = c.get('services')
  const body = await readBody(c, hostStatusPatchSchema)

  const host = await store.get('hosts', c.req.param('namespace'), c.req.param('name'))
  if (body.resourceVersion !== undefined) {
    host.resourceVersion = body.resourceVersion
  }
  if (body.provisioningState !== undefined) {
    host.status.provisioningState = body.provisioningState
  }
  if (body.hardwareDetails === null) {
    delete host.status.hardwareDetails
  } else if (body.hardwareDetails !== undefined) {
    host.status.hardwareDetails = body.hardwareDetails
  }

  return c.json(await store.updateHostStatus(host))
})

// Host events, oldest first
hostsRoutes.get('/:namespace/:name/events', async (c) => {
  const { store, events } = c.get('services')
  const host = await store.get('hosts', c.req.param('namespace'), c.req.param('name'))
  return c.json(events.list(host))
})

hostsRoutes.delete('/:namespace/:name', async (c) => {
  const { store, events } = c.get('services')
  const host = await store.delete('hosts', c.req.param('namespace'), c.req.param('name'))
  events.clear(host)
  return c.json({ success: true })
})
