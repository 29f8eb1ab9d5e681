import { createStore } from 'zustand/vanilla'
import { subscribeWithSelector } from 'zustand/middleware'
import { ProbeError } from '../utils/probeError'

export type VariableMap = ReadonlyMap<string, string>

/**
 * Variable store state: a global scope plus named contexts layered over it.
 *
 * Every mutation replaces the affected maps instead of editing them in place,
 * so a state object read by the template resolver is never partially written.
 *
 * @example
 * ```ts
 * const variables = createVariableStore()
 * variables.getState().setGlobal('host', 'localhost:8080')
 * variables.getState().setContext('staging', 'host', 'staging.example.test')
 *
 * resolveVariable(variables.getState(), 'staging', 'host') // 'staging.example.test'
 * resolveVariable(variables.getState(), null, 'host')      // 'localhost:8080'
 * ```
 *
 * @category Stores
 */
export interface VariableState {
  global: VariableMap
  contexts: ReadonlyMap<string, VariableMap>

  setGlobal: (name: string, value: string) => void
  deleteGlobal: (name: string) => void
  setContext: (contextName: string, name: string, value: string) => void
  deleteContextVariable: (contextName: string, name: string) => void
  deleteContext: (contextName: string) => void
  reset: () => void
}

export interface VariableSeed {
  global?: Record<string, string>
  contexts?: Record<string, Record<string, string>>
}

function assertName(kind: 'variable' | 'context', name: string): void {
  if (name.length === 0) {
    throw new ProbeError('invalid-name', `The ${kind} name must not be empty`)
  }
}

function seedMaps(seed: VariableSeed): Pick<VariableState, 'global' | 'contexts'> {
  const contexts = new Map<string, VariableMap>()
  for (const [contextName, vars] of Object.entries(seed.contexts ?? {})) {
    contexts.set(contextName, new Map(Object.entries(vars)))
  }
  return {
    global: new Map(Object.entries(seed.global ?? {})),
    contexts,
  }
}

/**
 * Look up a variable with context-then-global precedence.
 *
 * @returns The value, or undefined when neither scope defines `name`
 */
export function resolveVariable(
  state: Pick<VariableState, 'global' | 'contexts'>,
  contextName: string | null | undefined,
  name: string
): string | undefined {
  if (contextName) {
    const scoped = state.contexts.get(contextName)?.get(name)
    if (scoped !== undefined) return scoped
  }
  return state.global.get(name)
}

/**
 * List the context names, in creation order.
 */
export function listContexts(state: Pick<VariableState, 'contexts'>): string[] {
  return [...state.contexts.keys()]
}

export function createVariableStore(seed: VariableSeed = {}) {
  return createStore<VariableState>()(
    subscribeWithSelector((set) => ({
      ...seedMaps(seed),

      setGlobal: (name, value) => {
        assertName('variable', name)
        set((state) => {
          const global = new Map(state.global)
          global.set(name, value)
          return { global }
        })
      },

      deleteGlobal: (name) => set((state) => {
        if (!state.global.has(name)) return state
        const global = new Map(state.global)
        global.delete(name)
        return { global }
      }),

      setContext: (contextName, name, value) => {
        assertName('context', contextName)
        assertName('variable', name)
        set((state) => {
          const vars = new Map(state.contexts.get(contextName))
          vars.set(name, value)
          const contexts = new Map(state.contexts)
          contexts.set(contextName, vars)
          return { contexts }
        })
      },

      deleteContextVariable: (contextName, name) => set((state) => {
        const current = state.contexts.get(contextName)
        if (!current?.has(name)) return state
        const vars = new Map(current)
        vars.delete(name)
        const contexts = new Map(state.contexts)
        contexts.set(contextName, vars)
        return { contexts }
      }),

      deleteContext: (contextName) => set((state) => {
        if (!state.contexts.has(contextName)) return state
        const contexts = new Map(state.contexts)
        contexts.delete(contextName)
        return { contexts }
      }),

      reset: () => set(seedMaps(seed)),
    }))
  )
}

export type VariableStore = ReturnType<typeof createVariableStore>
