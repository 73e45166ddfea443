import { errorMessage } from '../errors'
import type { Secret, SecretData, SwitchDevice } from '../types'
import { renderCredentials } from './credentials'

export const SWITCH_CONFIG_KEY = 'switch-configs.conf'
export const CONFIG_BANNER = '# This file is managed by the Baremetal Operator\n\n'
export const DEFAULT_SWITCH_DRIVER = 'generic-switch'

export interface SwitchConfigStore {
  list(kind: 'switches', namespace?: string): Promise<SwitchDevice[]>
  get(kind: 'secrets', namespace: string, name: string): Promise<Secret>
  update(kind: 'secrets', secret: Secret): Promise<Secret>
}

export interface SwitchConfigResult {
  // Switch name -> INI section
  configEntries: Map<string, string>
  // "<mac-with-dashes>.key" -> private key, publickey switches only
  keyFiles: SecretData
}

export interface RenderedSection {
  section: string
  keyFiles: SecretData
}

/**
 * Renders the [switch:<name>] section for one switch. Fields come in a fixed
 * order; optional ones are left out when unset. The section ends with one blank line.
 */
export function renderSwitchSection(sw: SwitchDevice, secret: SecretData, credentialsPath: string): RenderedSection {
  const lines = [
    `[switch:${sw.name}]`,
    `address=${sw.spec.address}`,
    `mac_address=${sw.spec.macAddress}`,
  ]

  if (sw.spec.port !== undefined) {
    lines.push(`port=${sw.spec.port}`)
  }
  lines.push(`driver_type=${sw.spec.driver || DEFAULT_SWITCH_DRIVER}`)
  lines.push(`device_type=${sw.spec.deviceType}`)
  if (sw.spec.disableCertificateVerification !== undefined) {
    lines.push(`insecure=${sw.spec.disableCertificateVerification ? 'true' : 'false'}`)
  }

  const credentials = renderCredentials(sw, secret, credentialsPath)
  lines.push(...credentials.lines)

  return {
    section: `${lines.join('\n')}\n\n`,
    keyFiles: credentials.keyFiles,
  }
}

// Renders every switch in the namespace; any failing switch fails the whole generation
export async function generateSwitchConfig(
  store: SwitchConfigStore,
  namespace: string,
  credentialsPath: string,
): Promise<SwitchConfigResult> {
  let switchList: SwitchDevice[]
  try {
    switchList = await store.list('switches', namespace)
  } catch (err) {
    throw new Error(`failed to list switches: ${errorMessage(err)}`, { cause: err })
  }

  const result: SwitchConfigResult = { configEntries: new Map(), keyFiles: {} }

  for (const sw of switchList) {
    try {
      let secret: Secret
      try {
        secret = await store.get('secrets', sw.namespace, sw.spec.credentials.secretName)
      } catch (err) {
        throw new Error(
          `failed to get credentials secret ${sw.namespace}/${sw.spec.credentials.secretName}: ${errorMessage(err)}`,
          { cause: err },
        )
      }

      const rendered = renderSwitchSection(sw, secret.data, credentialsPath)
      result.configEntries.set(sw.name, rendered.section)
      Object.assign(result.keyFiles, rendered.keyFiles)
    } catch (err) {
      throw new Error(`failed to generate config for switch ${sw.name}: ${errorMessage(err)}`, { cause: err })
    }
  }

  return result
}

// Banner followed by every section, sorted by switch name
export function assembleSwitchConfig(configEntries: Map<string, string>): string {
  const names = [...configEntries.keys()].sort()
  return CONFIG_BANNER + names.map(name => configEntries.get(name) ?? '').join('')
}

// Missing and empty data maps are equal
export function secretDataEqual(a: SecretData | undefined, b: SecretData | undefined): boolean {
  const left = a ?? {}
  const right = b ?? {}
  const keys = Object.keys(left)
  if (keys.length !== Object.keys(right).length) return false

  return keys.every(key => {
    const other = right[key]
    return other !== undefined && Buffer.compare(left[key], other) === 0
  })
}

// Replaces a secret's data, skipping the write when nothing changed. Returns whether it wrote.
export async function updateSecretData(
  store: SwitchConfigStore,
  namespace: string,
  secretName: string,
  data: SecretData,
): Promise<boolean> {
  let secret: Secret
  try {
    secret = await store.get('secrets', namespace, secretName)
  } catch (err) {
    throw new Error(`failed to get secret ${secretName}: ${errorMessage(err)}`, { cause: err })
  }

  if (secretDataEqual(secret.data, data)) {
    return false
  }

  await store.update('secrets', { ...secret, data })
  return true
}

export interface PublishOptions {
  namespace: string
  configsSecretName: string
  credentialsSecretName: string
  credentialsPath: string
}

export interface PublishResult {
  configUpdated: boolean
  credentialsUpdated: boolean
  switchCount: number
}

/**
 * Regenerates the switch config for a namespace and writes it to the two
 * target secrets: the INI file under switch-configs.conf, and the private
 * key files. Generation completes before either secret is touched.
 */
export async function publishSwitchConfig(store: SwitchConfigStore, opts: PublishOptions): Promise<PublishResult> {
  const result = await generateSwitchConfig(store, opts.namespace, opts.credentialsPath)
  const config = assembleSwitchConfig(result.configEntries)

  let configUpdated: boolean
  try {
    configUpdated = await updateSecretData(store, opts.namespace, opts.configsSecretName, {
      [SWITCH_CONFIG_KEY]: Buffer.from(config, 'utf-8'),
    })
  } catch (err) {
    throw new Error(`failed to update switch configs secret: ${errorMessage(err)}`, { cause: err })
  }

  let credentialsUpdated: boolean
  try {
    credentialsUpdated = await updateSecretData(store, opts.namespace, opts.credentialsSecretName, result.keyFiles)
  } catch (err) {
    throw new Error(`failed to update switch credentials secret: ${errorMessage(err)}`, { cause: err })
  }

  return { configUpdated, credentialsUpdated, switchCount: result.configEntries.size }
}
