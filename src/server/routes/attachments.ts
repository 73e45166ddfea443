import { Hono } from 'hono'
import type { NetworkAttachment } from '../services/types'
import { createAttachmentSchema, readBody, updateAttachmentSchema } from './schemas'

export const attachmentsRoutes = new Hono()

// Admission warnings travel as HTTP Warning headers
function warningHeader(warnings: string[]): string {
  return warnings.map(w => `299 - ${JSON.stringify(w)}`).join(', ')
}

// List attachments (optionally filtered by namespace)
attachmentsRoutes.get('/', async (c) => {
  const { store } = c.get('services')
  const namespace = c.req.query('namespace')
  return c.json(await store.list('attachments', namespace || undefined))
})

attachmentsRoutes.get('/:namespace/:name', async (c) => {
  const { store } = c.get('services')
  return c.json(await store.get('attachments', c.req.param('namespace'), c.req.param('name')))
})

// Create attachment; field validation only, nothing can reference it yet
attachmentsRoutes.post('/', async (c) => {
  const { store, guard } = c.get('services')
  const body = await readBody(c, createAttachmentSchema)

  const attachment: NetworkAttachment = {
    namespace: body.namespace,
    name: body.name,
    spec: body.spec,
  }
  guard.validateCreate(attachment)

  return c.json(await store.create('attachments', attachment), 201)
})

// Update attachment; refused while any host interface references it
attachmentsRoutes.put('/:namespace/:name', async (c) => {
  const { store, guard } = c.get('services')
  const body = await readBody(c, updateAttachmentSchema)

  const current = await store.get('attachments', c.req.param('namespace'), c.req.param('name'))
  const next: NetworkAttachment = { ...current, resourceVersion: body.resourceVersion, spec: body.spec }

  const { warnings } = await guard.validateUpdate(current, next)
  if (warnings.length > 0) {
    c.header('Warning', warningHeader(warnings))
  }

  return c.json(await store.update('attachments', next))
})

attachmentsRoutes.delete('/:namespace/:name', async (c) => {
  const { store, guard } = c.get('services')
  const current = await store.get('attachments', c.req.param('namespace'), c.req.param('name'))

  await guard.validateDelete(current)
  await store.delete('attachments', current.namespace, current.name)

  return c.json({ success: true })
})
