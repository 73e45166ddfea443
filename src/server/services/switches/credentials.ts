import { posix } from 'path'
import type { SecretData, SwitchCredentialType, SwitchDevice } from '../types'

export const USERNAME_KEY = 'username'
export const PASSWORD_KEY = 'password'
export const PRIVATE_KEY_KEY = 'ssh-privatekey'

export interface RenderedCredentials {
  lines: string[]
  keyFiles: Record<string, Buffer>
}

// One variant per switch authentication scheme
export interface CredentialScheme {
  type: SwitchCredentialType
  requiredKey: string
  missingKeyMessage(secretName: string): string
  render(sw: SwitchDevice, value: Buffer, credentialsPath: string): RenderedCredentials
}

// Secret data keys cannot hold colons
export function keyFileName(macAddress: string): string {
  return `${macAddress.replaceAll(':', '-')}.key`
}

const passwordScheme: CredentialScheme = {
  type: 'password',
  requiredKey: PASSWORD_KEY,
  missingKeyMessage: (secretName) => `credentials secret ${secretName} missing '${PASSWORD_KEY}' key`,
  render: (_sw, value) => ({
    lines: [`password=${value.toString('utf-8')}`],
    keyFiles: {},
  }),
}

const publicKeyScheme: CredentialScheme = {
  type: 'publickey',
  requiredKey: PRIVATE_KEY_KEY,
  missingKeyMessage: (secretName) =>
    `credentials secret ${secretName} missing '${PRIVATE_KEY_KEY}' key for publickey auth`,
  render: (sw, value, credentialsPath) => {
    const fileName = keyFileName(sw.spec.macAddress)
    return {
      lines: [`key_file=${posix.join(credentialsPath, fileName)}`],
      keyFiles: { [fileName]: value },
    }
  },
}

const schemes: Record<SwitchCredentialType, CredentialScheme> = {
  password: passwordScheme,
  publickey: publicKeyScheme,
}

export function credentialScheme(type: SwitchCredentialType): CredentialScheme {
  return schemes[type]
}

// Renders the username line plus the scheme's own lines from the credential secret
export function renderCredentials(
  sw: SwitchDevice,
  data: SecretData,
  credentialsPath: string,
): RenderedCredentials {
  const secretName = sw.spec.credentials.secretName

  const username = data[USERNAME_KEY]
  if (username === undefined) {
    throw new Error(`credentials secret ${secretName} missing '${USERNAME_KEY}' key`)
  }

  const scheme = credentialScheme(sw.spec.credentials.type)
  const value = data[scheme.requiredKey]
  if (value === undefined) {
    throw new Error(scheme.missingKeyMessage(secretName))
  }

  const rendered = scheme.render(sw, value, credentialsPath)
  return {
    lines: [`username=${username.toString('utf-8')}`, ...rendered.lines],
    keyFiles: rendered.keyFiles,
  }
}
