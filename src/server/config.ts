import { z } from 'zod'
import type { ProvisioningState } from './services/types'

const provisioningStates = [
  'unmanaged',
  'registering',
  'inspecting',
  'preparing',
  'available',
  'provisioning',
  'provisioned',
  'deprovisioning',
  'externally-provisioned',
  'powering-off-before-delete',
  'deleting',
] as const satisfies readonly ProvisioningState[]

export const provisioningStateSchema = z.enum(provisioningStates)

const stateList = z
  .string()
  .transform(value => value.split(',').map(s => s.trim()).filter(Boolean))
  .pipe(z.array(provisioningStateSchema))

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: z.string().default('file:./data/switchport-operator.db'),
  IRONIC_ENDPOINT: z.string().url().default('http://localhost:6385'),
  IRONIC_USERNAME: z.string().optional(),
  IRONIC_PASSWORD: z.string().optional(),
  IRONIC_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  IRONIC_NETWORK_INTERFACE: z.string().optional(),
  IRONIC_SWITCH_CONFIGS_SECRET: z.string().min(1).default('ironic-switch-configs'),
  IRONIC_SWITCH_CREDENTIALS_SECRET: z.string().min(1).default('ironic-switch-credentials'),
  IRONIC_SWITCH_CREDENTIALS_PATH: z.string().min(1).default('/etc/ironic/switch-credentials'),
  MAX_CONCURRENT_RECONCILES: z.coerce.number().int().positive().default(3),
  PROVISION_REQUEUE_DELAY_MS: z.coerce.number().int().nonnegative().default(10_000),
  ERROR_REQUEUE_DELAY_MS: z.coerce.number().int().nonnegative().default(30_000),
  PORT_UPDATE_STATES: stateList.default('registering,preparing,available,inspecting'),
})

export interface Config {
  port: number
  databasePath: string
  ironic: {
    endpoint: string
    username?: string
    password?: string
    timeoutMs: number
    networkInterface?: string
  }
  switches: {
    configsSecretName: string
    credentialsSecretName: string
    credentialsPath: string
  }
  reconcile: {
    concurrency: number
    provisionRequeueDelayMs: number
    errorRequeueDelayMs: number
    portUpdateStates: ReadonlySet<ProvisioningState>
  }
}

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    throw new Error(`Invalid configuration: ${issues.join(', ')}`)
  }
  const e = parsed.data

  return {
    port: e.PORT,
    databasePath: e.DATABASE_URL.replace('file:', ''),
    ironic: {
      endpoint: e.IRONIC_ENDPOINT,
      username: e.IRONIC_USERNAME,
      password: e.IRONIC_PASSWORD,
      timeoutMs: e.IRONIC_REQUEST_TIMEOUT_MS,
      networkInterface: e.IRONIC_NETWORK_INTERFACE,
    },
    switches: {
      configsSecretName: e.IRONIC_SWITCH_CONFIGS_SECRET,
      credentialsSecretName: e.IRONIC_SWITCH_CREDENTIALS_SECRET,
      credentialsPath: e.IRONIC_SWITCH_CREDENTIALS_PATH,
    },
    reconcile: {
      concurrency: e.MAX_CONCURRENT_RECONCILES,
      provisionRequeueDelayMs: e.PROVISION_REQUEUE_DELAY_MS,
      errorRequeueDelayMs: e.ERROR_REQUEUE_DELAY_MS,
      portUpdateStates: new Set(e.PORT_UPDATE_STATES),
    },
  }
}
