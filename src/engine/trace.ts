/**
 * Computation trace — the explainability overlay of a simulation.
 *
 * Every (variable, period) the simulation resolves becomes a node that
 * records where the value came from and which values it was derived from.
 * Cache hits show up as leaf nodes so the tree mirrors what each formula
 * actually read.
 */

import type { Period } from './period'
import type { EntityKind } from './population'
import type { VariableDefinition } from './registry'
import { toPlain } from './vector'
import type { PlainValue, Vector } from './vector'

export type TraceSource = 'formula' | 'input' | 'default' | 'cache'

export interface TraceNode {
  variable: string
  period: string
  entity: EntityKind
  label?: string
  source: TraceSource
  value: PlainValue[]
  dependencies: TraceNode[]
}

export class Tracer {
  private readonly roots: TraceNode[] = []
  private readonly open: TraceNode[] = []

  /** Start a node for a value about to be resolved. */
  enter<P>(definition: VariableDefinition<P>, period: Period): TraceNode {
    const node: TraceNode = {
      variable: definition.name,
      period: period.toString(),
      entity: definition.entity,
      source: 'formula',
      value: [],
      dependencies: [],
    }
    if (definition.label) node.label = definition.label
    this.attach(node)
    this.open.push(node)
    return node
  }

  complete(node: TraceNode, value: Vector, source: Exclude<TraceSource, 'cache'>): void {
    node.value = toPlain(value)
    node.source = source
  }

  /** Close the innermost open node, whether or not it completed. */
  leave(): void {
    this.open.pop()
  }

  cached<P>(definition: VariableDefinition<P>, period: Period, value: Vector): void {
    const node: TraceNode = {
      variable: definition.name,
      period: period.toString(),
      entity: definition.entity,
      source: 'cache',
      value: toPlain(value),
      dependencies: [],
    }
    if (definition.label) node.label = definition.label
    this.attach(node)
  }

  /**
   * The node that computed (variable, period). A value is computed once
   * per run, so there is at most one; it may sit under another root when
   * the value was first needed as a dependency.
   */
  find(variable: string, period: Period): TraceNode | undefined {
    const key = period.toString()
    const queue = [...this.roots]
    for (let node = queue.shift(); node; node = queue.shift()) {
      if (node.variable === variable && node.period === key && node.source !== 'cache') return node
      queue.push(...node.dependencies)
    }
    return undefined
  }

  private attach(node: TraceNode): void {
    const parent = this.open[this.open.length - 1]
    if (parent) parent.dependencies.push(node)
    else this.roots.push(node)
  }
}

// ── explainTrace ─────────────────────────────────────────────────

/**
 * Render a trace as an indented tree:
 *
 *   income_tax [2025-01]: 492.67
 *     |- taxable_income [2025-01]: 3000
 *       |- salary [2025-01]: 3000 (input)
 */
export function explainTrace(node: TraceNode, depth = 0): string {
  const prefix = depth === 0 ? '' : '  '.repeat(depth) + '|- '
  const source = node.source === 'formula' ? '' : ` (${node.source})`
  const line = `${prefix}${node.variable} [${node.period}]: ${formatValues(node.value)}${source}`

  if (node.dependencies.length === 0) return line

  const children = node.dependencies.map((child) => explainTrace(child, depth + 1))
  return [line, ...children].join('\n')
}

function formatValues(values: PlainValue[]): string {
  const parts = values.map(formatValue)
  return parts.length === 1 ? parts[0] : `[${parts.join(', ')}]`
}

function formatValue(value: PlainValue): string {
  if (typeof value === 'number') return String(Math.round(value * 100) / 100)
  return String(value)
}
