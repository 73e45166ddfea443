import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { loadConfig } from '../../config'
import { createOperator, type Operator } from '../../operator'
import { createTestDb } from '../../test/db'
import { createFakeIronic } from '../../test/fake-ironic'
import { silentLogger } from '../logger'
import { SWITCH_CONFIG_KEY } from '../switches/config'
import type { Secret, SwitchDevice } from '../types'
import { switchesForSecret } from './switch'

function switchDevice(name: string, secretName: string, namespace = 'metal'): SwitchDevice {
  return {
    namespace,
    name,
    spec: {
      address: '192.168.1.1',
      macAddress: '00:00:5e:00:53:01',
      deviceType: 'cisco_ios',
      credentials: { type: 'password', secretName },
    },
  }
}

function secret(name: string, values: Record<string, string>, namespace = 'metal'): Secret {
  const data: Secret['data'] = {}
  for (const [key, value] of Object.entries(values)) data[key] = Buffer.from(value)
  return { namespace, name, data }
}

describe('switchesForSecret', () => {
  it('matches switches by namespace and credentials secret', () => {
    const switches = [
      switchDevice('leaf-1', 'shared-creds'),
      switchDevice('leaf-2', 'other-creds'),
      switchDevice('leaf-3', 'shared-creds', 'lab'),
      switchDevice('spine', 'shared-creds'),
    ]

    expect(switchesForSecret(switches, secret('shared-creds', {}))).toEqual(['metal/leaf-1', 'metal/spine'])
  })
})

describe('SwitchController', () => {
  let operator: Operator

  beforeEach(async () => {
    operator = createOperator(createTestDb().db, loadConfig({}), {
      fetch: createFakeIronic().fetch,
      logger: () => silentLogger,
      requestLog: false,
    })
    await operator.store.create('secrets', secret('ironic-switch-configs', {}))
    await operator.store.create('secrets', secret('ironic-switch-credentials', {}))
  })

  afterEach(async () => {
    await operator.switchController.stop()
  })

  async function publishedConfig(): Promise<string | undefined> {
    const configs = await operator.store.get('secrets', 'metal', 'ironic-switch-configs')
    return configs.data[SWITCH_CONFIG_KEY]?.toString('utf-8')
  }

  it('publishes the namespace config for a switch key', async () => {
    await operator.store.create('secrets', secret('switch1-creds', { username: 'admin', password: 'secret123' }))
    await operator.store.create('switches', switchDevice('switch1', 'switch1-creds'))

    expect(await operator.switchController.reconcile('metal/switch1')).toEqual({})
    expect(await publishedConfig()).toBe(
      '# This file is managed by the Baremetal Operator\n\n'
      + '[switch:switch1]\naddress=192.168.1.1\nmac_address=00:00:5e:00:53:01\ndriver_type=generic-switch\n'
      + 'device_type=cisco_ios\nusername=admin\npassword=secret123\n\n',
    )
  })

  it('fails when a credentials secret is missing', async () => {
    await operator.store.create('switches', switchDevice('switch1', 'switch1-creds'))

    await expect(operator.switchController.reconcile('metal/switch1')).rejects.toThrow(
      'failed to generate config for switch switch1',
    )
    expect(await publishedConfig()).toBeUndefined()
  })

  it('follows switch and credential changes once started', async () => {
    await operator.switchController.start()

    await operator.store.create('secrets', secret('switch1-creds', { username: 'admin', password: 'secret123' }))
    await operator.store.create('switches', switchDevice('switch1', 'switch1-creds'))
    await operator.switchController.queue.drain()
    expect(await publishedConfig()).toContain('password=secret123\n')

    const creds = await operator.store.get('secrets', 'metal', 'switch1-creds')
    await operator.store.update('secrets', { ...creds, data: secret('x', { username: 'admin', password: 'rotated' }).data })
    await vi.waitFor(async () => {
      expect(await publishedConfig()).toContain('password=rotated\n')
    })

    await operator.store.delete('switches', 'metal', 'switch1')
    await operator.switchController.queue.drain()
    expect(await publishedConfig()).toBe('# This file is managed by the Baremetal Operator\n\n')
  })
})
