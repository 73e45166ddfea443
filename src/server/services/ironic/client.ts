/**
 * Ironic REST API client
 *
 * Covers the node and port operations the operator needs: node enrollment,
 * and port listing, creation and patching.
 */

import { z } from 'zod'
import { OperatorError, TransientError, errorMessage } from '../errors'

// Microversion with port local_link_connection, pxe_enabled and node filters
export const IRONIC_API_VERSION = '1.81'

export interface IronicConfig {
  endpoint: string
  username?: string
  password?: string
  timeoutMs: number
  fetch?: typeof fetch
}

const jsonObject = z.record(z.unknown())

const portSchema = z.object({
  uuid: z.string(),
  address: z.string(),
  node_uuid: z.string().nullish(),
  pxe_enabled: z.boolean().nullish(),
  local_link_connection: jsonObject.nullish(),
  extra: jsonObject.nullish(),
})

const portListSchema = z.object({
  ports: z.array(portSchema),
})

const nodeSchema = z.object({
  uuid: z.string(),
  name: z.string().nullish(),
  provision_state: z.string().nullish(),
  driver_info: jsonObject.nullish(),
})

export type IronicPort = z.infer<typeof portSchema>
export type IronicNode = z.infer<typeof nodeSchema>

export interface CreateNodeOpts {
  name: string
  driver: string
  driver_info: Record<string, unknown>
  network_interface?: string
}

export interface CreatePortOpts {
  address: string
  node_uuid: string
  pxe_enabled: boolean
  extra?: Record<string, unknown>
  local_link_connection?: Record<string, unknown>
}

export type PatchOp =
  | { op: 'add' | 'replace'; path: string; value: unknown }
  | { op: 'remove'; path: string }

export type PortFilter = { nodeId: string } | { address: string }

// Error answered by Ironic, carrying its HTTP status
export class IronicError extends OperatorError {
  constructor(message: string, status: number) {
    super(message, status)
  }
}

export function isConflict(err: unknown): boolean {
  return err instanceof IronicError && err.status === 409
}

// Service unavailability, timeouts and server-side errors are worth a later retry
export function isTransient(err: unknown): boolean {
  if (err instanceof TransientError) return true
  return err instanceof IronicError && (err.status >= 500 || err.status === 409)
}

// The port API the reconciler works against
export interface PortApi {
  listPorts(filter: PortFilter): Promise<IronicPort[]>
  createPort(opts: CreatePortOpts): Promise<IronicPort>
  updatePort(portId: string, patch: PatchOp[]): Promise<IronicPort>
}

export interface NodeApi {
  createNode(opts: CreateNodeOpts): Promise<IronicNode>
  getNode(nodeId: string): Promise<IronicNode>
  updateNode(nodeId: string, patch: PatchOp[]): Promise<IronicNode>
}

export class IronicClient implements PortApi, NodeApi {
  private baseUrl: string
  private config: IronicConfig
  private fetchFn: typeof fetch

  constructor(config: IronicConfig) {
    this.config = config
    this.baseUrl = config.endpoint.replace(/\/+$/, '')
    this.fetchFn = config.fetch ?? fetch
  }

  private headers(hasBody: boolean, contentType = 'application/json'): Record<string, string> {
    const headers: Record<string, string> = {
      'Accept': 'application/json',
      'X-OpenStack-Ironic-API-Version': IRONIC_API_VERSION,
    }
    if (hasBody) {
      headers['Content-Type'] = contentType
    }
    if (this.config.username !== undefined) {
      const token = Buffer.from(`${this.config.username}:${this.config.password ?? ''}`).toString('base64')
      headers['Authorization'] = `Basic ${token}`
    }
    return headers
  }

  private async request<T>(
    method: string,
    path: string,
    schema: z.ZodType<T>,
    body?: unknown,
    contentType?: string,
  ): Promise<T> {
    let response: Response
    try {
      response = await this.fetchFn(`${this.baseUrl}${path}`, {
        method,
        headers: this.headers(body !== undefined, contentType),
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal: AbortSignal.timeout(this.config.timeoutMs),
      })
    } catch (err) {
      // Connection refused, DNS failure or timeout
      throw new TransientError(`Ironic ${method} ${path} failed: ${errorMessage(err)}`, { cause: err })
    }

    if (!response.ok) {
      const text = await response.text()
      throw new IronicError(
        `Ironic ${method} ${path} failed: ${response.status} ${response.statusText} - ${text}`,
        response.status,
      )
    }

    const parsed = schema.safeParse(await response.json())
    if (!parsed.success) {
      throw new IronicError(`Ironic ${method} ${path} returned an unexpected body: ${parsed.error.message}`, 502)
    }
    return parsed.data
  }

  async createNode(opts: CreateNodeOpts): Promise<IronicNode> {
    return this.request('POST', '/v1/nodes', nodeSchema, opts)
  }

  async getNode(nodeId: string): Promise<IronicNode> {
    return this.request('GET', `/v1/nodes/${encodeURIComponent(nodeId)}`, nodeSchema)
  }

  async updateNode(nodeId: string, patch: PatchOp[]): Promise<IronicNode> {
    return this.request('PATCH', `/v1/nodes/${encodeURIComponent(nodeId)}`, nodeSchema, patch, 'application/json-patch+json')
  }

  async listPorts(filter: PortFilter): Promise<IronicPort[]> {
    const query = 'nodeId' in filter
      ? `node_uuid=${encodeURIComponent(filter.nodeId)}`
      : `address=${encodeURIComponent(filter.address)}`
    const result = await this.request('GET', `/v1/ports/detail?${query}`, portListSchema)
    return result.ports
  }

  async createPort(opts: CreatePortOpts): Promise<IronicPort> {
    return this.request('POST', '/v1/ports', portSchema, opts)
  }

  async updatePort(portId: string, patch: PatchOp[]): Promise<IronicPort> {
    return this.request('PATCH', `/v1/ports/${encodeURIComponent(portId)}`, portSchema, patch, 'application/json-patch+json')
  }
}
