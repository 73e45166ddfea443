import { beforeEach, describe, expect, it } from 'vitest'
import { createTestDb } from '../test/db'
import { HostEventRecorder } from './events'
import { silentLogger } from './logger'

const worker = { namespace: 'metal', name: 'worker-0' }
const other = { namespace: 'metal', name: 'worker-1' }

describe('HostEventRecorder', () => {
  let events: HostEventRecorder

  beforeEach(() => {
    events = new HostEventRecorder(createTestDb().db, silentLogger, 3)
  })

  const reasons = (host = worker) => events.list(host).map(e => `${e.reason}: ${e.message}`)

  it('lists events of one host, oldest first', () => {
    events.publish(worker, 'success', 'Registered', 'Registered new host as node node-1')
    events.publish(other, 'info', 'AllInterfacesValid', 'ok')
    events.publish(worker, 'error', 'PortConfigurationFailed', 'boom')

    expect(reasons()).toEqual(['Registered: Registered new host as node node-1', 'PortConfigurationFailed: boom'])
    expect(events.list(worker)[1].level).toBe('error')
  })

  it('stores a recurring outcome once', () => {
    events.publish(worker, 'error', 'PortConfigurationFailed', 'boom')
    events.publish(worker, 'error', 'PortConfigurationFailed', 'boom')
    events.publish(worker, 'error', 'PortConfigurationFailed', 'bang')
    events.publish(worker, 'error', 'PortConfigurationFailed', 'boom')

    expect(reasons()).toEqual([
      'PortConfigurationFailed: boom',
      'PortConfigurationFailed: bang',
      'PortConfigurationFailed: boom',
    ])
  })

  it('keeps only the newest events of each host', () => {
    for (const n of [1, 2, 3, 4, 5]) {
      events.publish(worker, 'info', 'Step', `step ${n}`)
    }
    events.publish(other, 'info', 'Step', 'step 1')

    expect(reasons()).toEqual(['Step: step 3', 'Step: step 4', 'Step: step 5'])
    expect(reasons(other)).toEqual(['Step: step 1'])
  })

  it('clears the events of one host', () => {
    events.publish(worker, 'info', 'Step', 'step 1')
    events.publish(other, 'info', 'Step', 'step 1')
    events.clear(worker)

    expect(events.list(worker)).toEqual([])
    expect(reasons(other)).toEqual(['Step: step 1'])
  })
})
