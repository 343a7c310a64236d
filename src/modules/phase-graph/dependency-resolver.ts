/**
 * Cycle detection over the phase predecessor relation (DFS with
 * visited/inStack sets).
 */

/**
 * @param edges - node id → ids it depends on; unknown ids are ignored
 * @returns the cycle path (e.g. ['a', 'b', 'a']) or null
 */
export function detectCycle(edges: ReadonlyMap<string, readonly string[]>): string[] | null {
  const visited = new Set<string>()
  const inStack = new Set<string>()

  function dfs(nodeId: string, path: string[]): string[] | null {
    visited.add(nodeId)
    inStack.add(nodeId)

    for (const dep of edges.get(nodeId) ?? []) {
      if (!edges.has(dep)) continue
      if (inStack.has(dep)) {
        const cycleStart = path.indexOf(dep)
        return [...path.slice(cycleStart), dep]
      }
      if (!visited.has(dep)) {
        const cycle = dfs(dep, [...path, dep])
        if (cycle) return cycle
      }
    }

    inStack.delete(nodeId)
    return null
  }

  for (const id of edges.keys()) {
    if (!visited.has(id)) {
      const cycle = dfs(id, [id])
      if (cycle) return cycle
    }
  }
  return null
}
