/**
 * Built-in Callbacks
 *
 * Notifiers and actions that stored events refer to by name. Light
 * actions run a named protocol on the home automation endpoint by
 * POSTing `{ protocol_name, arguments }`.
 */

import type { CallbackRegistry } from '../scheduler/registry.js'
import type { BoundArgs } from '../scheduler/types.js'
import { postJson } from './webhook.js'

export const LIGHT_COLORS = [
  'red',
  'blue',
  'green',
  'yellow',
  'white',
  'purple',
  'orange',
  'pink',
] as const

export type LightColor = (typeof LIGHT_COLORS)[number]

export interface BuiltinActionsConfig {
  /** URL of the protocol runner, e.g. http://127.0.0.1:8000/protocols/run */
  protocolEndpoint: string
  timeoutMs?: number
}

export interface ProtocolRequest {
  protocol_name: string
  arguments: BoundArgs
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1)
}

/**
 * Run a named protocol on the configured endpoint.
 */
export async function runProtocol(
  config: BuiltinActionsConfig,
  protocolName: string,
  args: BoundArgs = {},
): Promise<void> {
  const body: ProtocolRequest = { protocol_name: protocolName, arguments: args }
  await postJson(config.protocolEndpoint, body, { timeoutMs: config.timeoutMs })
}

export function registerBuiltinNotifiers(registry: CallbackRegistry): void {
  registry.registerNotifier('console', (id, title) => {
    console.log(`[Notifier] Upcoming: "${title}" (${id})`)
  })
}

export function registerBuiltinActions(
  registry: CallbackRegistry,
  config: BuiltinActionsConfig,
): void {
  registry.registerAction('hello', ({ taskId, title }) => {
    console.log(`[Action] Hello from "${title}" (${taskId})`)
  })

  // callJarvisApi is the name events stored by earlier releases carry
  const dimAllLights = () => runProtocol(config, 'Dim All Lights')
  registry.registerAction('dimAllLights', dimAllLights)
  registry.registerAction('callJarvisApi', dimAllLights)

  const lightsOn = () => runProtocol(config, 'lights_on')
  const lightsOff = () => runProtocol(config, 'lights_off')
  registry.registerAction('lightsOn', lightsOn)
  registry.registerAction('lights_on', lightsOn)
  registry.registerAction('lightsOff', lightsOff)
  registry.registerAction('lights_off', lightsOff)

  for (const color of LIGHT_COLORS) {
    const setColor = () => runProtocol(config, 'Light Color Control', { color })
    registry.registerAction(`lights${capitalize(color)}`, setColor)
    registry.registerAction(`lights_${color}`, setColor)
  }
}
