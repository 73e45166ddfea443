import { Hono } from 'hono'
import { createSwitchSchema, readBody, updateSwitchSchema } from './schemas'

export const switchesRoutes = new Hono()

switchesRoutes.get('/', async (c) => {
  const { store } = c.get('services')
  const namespace = c.req.query('namespace')
  return c.json(await store.list('switches', namespace || undefined))
})

switchesRoutes.get('/:namespace/:name', async (c) => {
  const { store } = c.get('services')
  return c.json(await store.get('switches', c.req.param('namespace'), c.req.param('name')))
})

switchesRoutes.post('/', async (c) => {
  const { store } = c.get('services')
  const body = await readBody(c, createSwitchSchema)
  const created = await store.create('switches', { namespace: body.namespace, name: body.name, spec: body.spec })
  return c.json(created, 201)
})

switchesRoutes.put('/:namespace/:name', async (c) => {
  const { store } = c.get('services')
  const body = await readBody(c, updateSwitchSchema)

  const current = await store.get('switches', c.req.param('namespace'), c.req.param('name'))
  return c.json(await store.update('switches', { ...current, resourceVersion: body.resourceVersion, spec: body.spec }))
})

switchesRoutes.delete('/:namespace/:name', async (c) => {
  const { store } = c.get('services')
  await store.delete('switches', c.req.param('namespace'), c.req.param('name'))
  return c.json({ success: true })
})
