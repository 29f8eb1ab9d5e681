import { createStore } from 'zustand/vanilla'
import { subscribeWithSelector } from 'zustand/middleware'
import type { ConnectionConfig } from '../core/types'
import { ProbeError } from '../utils/probeError'

export const DEFAULT_CONFIGURATION_NAME = 'default'

/**
 * A fresh configuration: no URL, no headers, certificate checks on,
 * auto-reconnect on, everything else off.
 */
export function createDefaultConfiguration(): ConnectionConfig {
  return {
    url: '',
    headers: [],
    sslVerify: true,
    autoPing: false,
    autoReconnect: true,
    useTemplateForURL: false,
    useTemplateForData: false,
    activeContext: null,
  }
}

/**
 * Named connection configurations with one selected at a time.
 *
 * The store is in-memory only; saving and loading configurations is up to the
 * host application (subscribe to the store and serialize it however it likes).
 *
 * @category Stores
 */
export interface ConfigurationState {
  configurations: ReadonlyMap<string, ConnectionConfig>
  selected: string

  addConfiguration: (name: string, config?: ConnectionConfig) => void
  deleteConfiguration: (name: string) => void
  selectConfiguration: (name: string) => void
  /** Patch the selected configuration */
  updateConfiguration: (patch: Partial<ConnectionConfig>) => void
  /** Set a header on the selected configuration, replacing a same-named one in place */
  setHeader: (name: string, value: string) => void
  /** Remove a header from the selected configuration */
  removeHeader: (name: string) => void
  reset: () => void
}

/**
 * The selected configuration, or the first one when the selection is stale.
 */
export function selectActiveConfiguration(
  state: Pick<ConfigurationState, 'configurations' | 'selected'>
): ConnectionConfig {
  const selected = state.configurations.get(state.selected)
  if (selected) return selected
  const first = state.configurations.values().next()
  return first.done ? createDefaultConfiguration() : first.value
}

function initialConfigurations(): Pick<ConfigurationState, 'configurations' | 'selected'> {
  return {
    configurations: new Map([[DEFAULT_CONFIGURATION_NAME, createDefaultConfiguration()]]),
    selected: DEFAULT_CONFIGURATION_NAME,
  }
}

export function createConfigurationStore() {
  return createStore<ConfigurationState>()(
    subscribeWithSelector((set) => {
      // Applies `update` to the selected configuration, if it exists
      const patchSelected = (update: (config: ConnectionConfig) => ConnectionConfig) =>
        set((state) => {
          const current = state.configurations.get(state.selected)
          if (!current) return state
          const configurations = new Map(state.configurations)
          configurations.set(state.selected, update(current))
          return { configurations }
        })

      return {
        ...initialConfigurations(),

        addConfiguration: (name, config) => {
          if (name.length === 0) {
            throw new ProbeError('invalid-name', 'The configuration name must not be empty')
          }
          set((state) => {
            const configurations = new Map(state.configurations)
            configurations.set(name, config ?? createDefaultConfiguration())
            return { configurations }
          })
        },

        deleteConfiguration: (name) => set((state) => {
          if (!state.configurations.has(name)) return state
          const configurations = new Map(state.configurations)
          configurations.delete(name)
          if (configurations.size === 0) {
            configurations.set(DEFAULT_CONFIGURATION_NAME, createDefaultConfiguration())
          }
          const selected = configurations.has(state.selected)
            ? state.selected
            : [...configurations.keys()][0]
          return { configurations, selected }
        }),

        selectConfiguration: (name) => set((state) =>
          state.configurations.has(name) ? { selected: name } : state
        ),

        updateConfiguration: (patch) => patchSelected((config) => ({ ...config, ...patch })),

        setHeader: (name, value) => {
          if (name.length === 0) {
            throw new ProbeError('invalid-name', 'The header name must not be empty')
          }
          patchSelected((config) => {
            const index = config.headers.findIndex((header) => header.name === name)
            const headers = [...config.headers]
            if (index === -1) {
              headers.push({ name, value })
            } else {
              headers[index] = { name, value }
            }
            return { ...config, headers }
          })
        },

        removeHeader: (name) => patchSelected((config) => ({
          ...config,
          headers: config.headers.filter((header) => header.name !== name),
        })),

        reset: () => set(initialConfigurations()),
      }
    })
  )
}

export type ConfigurationStore = ReturnType<typeof createConfigurationStore>
