/**
 * Bounded structural scan over arbitrary parsed JSON.
 *
 * Depth-first, pre-order, over an explicit stack. Each container is visited
 * at most once (visited set keyed by reference) and the walk stops at
 * maxDepth / maxNodes.
 */

import { isRecord, type JsonRecord } from '../../utils/json.js'

export interface ScanLimits {
  maxDepth: number
  maxNodes: number
}

export const DEFAULT_SCAN_LIMITS: ScanLimits = {
  maxDepth: 48,
  maxNodes: 50_000,
}

export type ScanNode = JsonRecord | unknown[]

/**
 * - `claim`: accept the node, do not descend into it
 * - `stop`: end the scan
 * - `descend`: keep walking into the node's children
 */
export type ScanDecision = 'claim' | 'stop' | 'descend'

export type ScanVisitor = (node: ScanNode, path: string) => ScanDecision

interface Frame {
  node: ScanNode
  path: string
  depth: number
}

function isContainer(value: unknown): value is ScanNode {
  return Array.isArray(value) || isRecord(value)
}

function childPath(parent: string, key: string | number): string {
  if (typeof key === 'number') return `${parent}[${key}]`
  return parent ? `${parent}.${key}` : key
}

export interface ScanReport {
  visited: number
  truncated: boolean
}

export function deepScan(
  root: unknown,
  visit: ScanVisitor,
  limits: ScanLimits = DEFAULT_SCAN_LIMITS
): ScanReport {
  if (!isContainer(root)) return { visited: 0, truncated: false }

  const seen = new Set<object>()
  const stack: Frame[] = [{ node: root, path: '', depth: 0 }]
  let visited = 0

  while (stack.length > 0) {
    const frame = stack.pop()
    if (!frame || seen.has(frame.node)) continue
    seen.add(frame.node)

    if (visited >= limits.maxNodes) {
      return { visited, truncated: true }
    }
    visited++

    const decision = visit(frame.node, frame.path)
    if (decision === 'stop') return { visited, truncated: false }
    if (decision === 'claim' || frame.depth >= limits.maxDepth) continue

    // Push in reverse so children pop in document order
    const children: Frame[] = []
    if (Array.isArray(frame.node)) {
      frame.node.forEach((child, index) => {
        if (isContainer(child)) {
          children.push({ node: child, path: childPath(frame.path, index), depth: frame.depth + 1 })
        }
      })
    } else {
      for (const [key, child] of Object.entries(frame.node)) {
        if (isContainer(child)) {
          children.push({ node: child, path: childPath(frame.path, key), depth: frame.depth + 1 })
        }
      }
    }
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i])
    }
  }

  return { visited, truncated: false }
}

/**
 * Find the first node bearing one of `keys` whose value is a container.
 */
export function findKeyedContainer(
  root: unknown,
  keys: readonly string[],
  limits: ScanLimits = DEFAULT_SCAN_LIMITS
): { value: ScanNode; path: string } | undefined {
  let found: { value: ScanNode; path: string } | undefined
  deepScan(
    root,
    (node, path) => {
      if (Array.isArray(node)) return 'descend'
      for (const key of keys) {
        const value = node[key]
        if (isContainer(value)) {
          found = { value, path: childPath(path, key) }
          return 'stop'
        }
      }
      return 'descend'
    },
    limits
  )
  return found
}
