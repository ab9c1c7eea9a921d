/**
 * Built-in Callbacks: Module Exports
 */

export {
  registerBuiltinActions,
  registerBuiltinNotifiers,
  runProtocol,
  LIGHT_COLORS,
} from './builtin.js'
export type { BuiltinActionsConfig, LightColor, ProtocolRequest } from './builtin.js'
export { postJson } from './webhook.js'
export type { PostJsonOptions } from './webhook.js'
