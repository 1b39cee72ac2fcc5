/**
 * Arc Consistency (AC-3)
 *
 * Propagates binary constraints over the constraint graph with a directed-arc
 * worklist, removing dates that have no supporting date in a neighbour.
 * Every removed date is one that no complete solution can use.
 */

import type { Meeting } from './meeting'
import type { Constraint, Operator } from './constraints'
import { consistent, invertOperator } from './constraints'

// ============================================================================
// Types
// ============================================================================

/**
 * Every date of `dependent` must have some date of `support` with
 * `dependent OP support`.
 */
export type Arc = {
  readonly dependent: number
  readonly support: number
  readonly operator: Operator
}

export type ArcConsistencyResult = {
  /** False when propagation emptied a domain: the problem has no solution. */
  consistent: boolean
  revisions: number
  removed: number
}

export function arcKey(arc: Arc): string {
  return `${arc.dependent}:${arc.support}:${arc.operator}`
}

export function reverseArc(arc: Arc): Arc {
  return { dependent: arc.support, support: arc.dependent, operator: invertOperator(arc.operator) }
}

// ============================================================================
// Arc Construction
// ============================================================================

/**
 * Both directed arcs of every binary constraint, in constraint order, with
 * duplicates dropped. `left < right` yields `left→right (<)` and
 * `right→left (>)`. Self-referencing constraints yield no arcs.
 */
export function buildArcs(constraints: readonly Constraint[]): Arc[] {
  const arcs: Arc[] = []
  const seen = new Set<string>()

  for (const c of constraints) {
    if (c.kind !== 'binary' || c.left === c.right) continue
    const forward: Arc = { dependent: c.left, support: c.right, operator: c.operator }
    for (const arc of [forward, reverseArc(forward)]) {
      const key = arcKey(arc)
      if (seen.has(key)) continue
      seen.add(key)
      arcs.push(arc)
    }
  }

  return arcs
}

// ============================================================================
// Worklist
// ============================================================================

/** FIFO of arcs; an arc already waiting is not queued twice. */
export class ArcQueue {
  private readonly items: Arc[] = []
  private readonly pending = new Set<string>()
  private head = 0

  constructor(initial: Iterable<Arc> = []) {
    for (const arc of initial) this.push(arc)
  }

  get size(): number {
    return this.items.length - this.head
  }

  push(arc: Arc): boolean {
    const key = arcKey(arc)
    if (this.pending.has(key)) return false
    this.pending.add(key)
    this.items.push(arc)
    return true
  }

  shift(): Arc | undefined {
    if (this.head >= this.items.length) return undefined
    const arc = this.items[this.head]
    this.head++
    // Compact once the consumed prefix dominates
    if (this.head > 64 && this.head * 2 > this.items.length) {
      this.items.splice(0, this.head)
      this.head = 0
    }
    if (arc) this.pending.delete(arcKey(arc))
    return arc
  }
}

// ============================================================================
// Revise
// ============================================================================

/**
 * Drops every date of `dependent` with no date in `support` satisfying
 * `dependent OP support`. Returns the number of dates removed.
 */
export function revise(dependent: Meeting, support: Meeting, operator: Operator): number {
  const before = dependent.domain.length
  const supportDomain = support.domain
  dependent.domain = dependent.domain.filter(vx =>
    supportDomain.some(vy => consistent(vx, vy, operator))
  )
  return before - dependent.domain.length
}

// ============================================================================
// Propagation
// ============================================================================

/**
 * Runs AC-3 over `meetings` in place. Stops as soon as a domain empties.
 * `constraints` supplies the binary constraints; unary ones are ignored.
 */
export function enforceArcConsistency(
  meetings: readonly Meeting[],
  constraints: readonly Constraint[]
): ArcConsistencyResult {
  const result: ArcConsistencyResult = { consistent: true, revisions: 0, removed: 0 }

  if (meetings.some(m => m.domain.length === 0)) {
    result.consistent = false
    return result
  }

  const arcs = buildArcs(constraints)

  // Arcs grouped by the meeting they draw support from
  const arcsInto = new Map<number, Arc[]>()
  for (const arc of arcs) {
    const into = arcsInto.get(arc.support)
    if (into) into.push(arc)
    else arcsInto.set(arc.support, [arc])
  }

  const queue = new ArcQueue(arcs)

  for (let arc = queue.shift(); arc !== undefined; arc = queue.shift()) {
    const dependent = meetings[arc.dependent]
    const support = meetings[arc.support]
    if (!dependent || !support) continue

    result.revisions++
    const removed = revise(dependent, support, arc.operator)
    if (removed === 0) continue

    result.removed += removed
    if (dependent.domain.length === 0) {
      result.consistent = false
      return result
    }

    // The reverse of the arc just revised keeps its support: the dates
    // removed from `dependent` supported nothing under this operator.
    const skip = arcKey(reverseArc(arc))
    for (const next of arcsInto.get(arc.dependent) ?? []) {
      if (arcKey(next) !== skip) queue.push(next)
    }
  }

  return result
}
