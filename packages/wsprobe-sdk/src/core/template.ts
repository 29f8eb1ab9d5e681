/**
 * Placeholder substitution for URLs and outgoing frames.
 *
 * Two placeholder forms are recognized:
 * - `$name`: the longest run of `[A-Za-z0-9_]` after the `$`
 * - `${name}`: everything up to the next `}` (no nesting)
 *
 * `$$` renders as a single `$`. A placeholder whose name does not resolve is
 * copied to the output unchanged, as is a `$` that starts neither form.
 *
 * @module Core/Template
 */
import type { VariableStore } from '../stores/variableStore'
import { resolveVariable } from '../stores/variableStore'

export type VariableLookup = (name: string) => string | undefined

const IDENTIFIER_CHAR = /[A-Za-z0-9_]/

type Segment =
  | { type: 'literal'; text: string }
  | { type: 'placeholder'; name: string; source: string }

/** Split a template into literal text and placeholders. */
function scan(template: string, visit: (segment: Segment) => void): void {
  let literalStart = 0
  let i = template.indexOf('$')

  while (i !== -1) {
    if (i > literalStart) visit({ type: 'literal', text: template.slice(literalStart, i) })

    const next = template.charAt(i + 1)
    let end = i + 1

    if (next === '$') {
      visit({ type: 'literal', text: '$' })
      end = i + 2
    } else if (next === '{') {
      const close = template.indexOf('}', i + 2)
      const name = close === -1 ? '' : template.slice(i + 2, close)
      if (name.length > 0) {
        end = close + 1
        visit({ type: 'placeholder', name, source: template.slice(i, end) })
      } else {
        visit({ type: 'literal', text: '$' })
      }
    } else {
      while (end < template.length && IDENTIFIER_CHAR.test(template.charAt(end))) end++
      if (end > i + 1) {
        visit({ type: 'placeholder', name: template.slice(i + 1, end), source: template.slice(i, end) })
      } else {
        visit({ type: 'literal', text: '$' })
      }
    }

    literalStart = end
    i = template.indexOf('$', end)
  }

  if (literalStart < template.length) visit({ type: 'literal', text: template.slice(literalStart) })
}

/**
 * Substitute placeholders using `lookup`.
 *
 * @example
 * ```typescript
 * renderTemplate('ws://$host/u/${user}', (name) => ({ host: 'localhost' })[name])
 * // 'ws://localhost/u/${user}'
 * ```
 */
export function renderTemplate(template: string, lookup: VariableLookup): string {
  if (!template.includes('$')) return template

  let output = ''
  scan(template, (segment) => {
    if (segment.type === 'literal') {
      output += segment.text
    } else {
      output += lookup(segment.name) ?? segment.source
    }
  })
  return output
}

/**
 * Names of all placeholders in a template, in order of first appearance.
 */
export function collectPlaceholders(template: string): string[] {
  const names = new Set<string>()
  scan(template, (segment) => {
    if (segment.type === 'placeholder') names.add(segment.name)
  })
  return [...names]
}

/**
 * Renders templates against a variable store with context-then-global precedence.
 *
 * @category Templates
 */
export interface TemplateResolver {
  render(template: string, contextName?: string | null): string
  /** Placeholder names that would be left verbatim by `render` */
  unresolved(template: string, contextName?: string | null): string[]
}

export function createTemplateResolver(variables: VariableStore): TemplateResolver {
  return {
    render(template, contextName) {
      // One snapshot per render so a concurrent edit cannot mix old and new values
      const state = variables.getState()
      return renderTemplate(template, (name) => resolveVariable(state, contextName, name))
    },

    unresolved(template, contextName) {
      const state = variables.getState()
      return collectPlaceholders(template).filter(
        (name) => resolveVariable(state, contextName, name) === undefined
      )
    },
  }
}
