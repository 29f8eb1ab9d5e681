/**
 * Framework-agnostic zustand stores.
 *
 * @packageDocumentation
 * @module Stores
 */

export {
  createVariableStore,
  resolveVariable,
  listContexts,
} from './variableStore'
export type { VariableState, VariableStore, VariableMap, VariableSeed } from './variableStore'

export {
  createConfigurationStore,
  createDefaultConfiguration,
  selectActiveConfiguration,
  DEFAULT_CONFIGURATION_NAME,
} from './configurationStore'
export type { ConfigurationState, ConfigurationStore } from './configurationStore'

export { createConnectionStore } from './connectionStore'
export type { ConnectionStatusState, ConnectionStore } from './connectionStore'
