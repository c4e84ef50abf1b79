import { END } from '@threadgraph/nodes'

export const START = '__start__'

export interface MermaidInput {
  entry: string
  nodeNames: ReadonlyArray<string>
  edges: ReadonlyArray<{ from: string; targets: ReadonlyArray<string>; labels: ReadonlyArray<string> }>
  terminals: ReadonlyArray<string>
  interrupts: ReadonlyArray<{ node: string; when: string }>
}

const ref = (id: string): string => {
  if (id === START) return `${START}((start))`
  if (id === END) return `${END}((end))`
  return id
}

/**
 * Renders the graph as a Mermaid flowchart. Interrupt nodes are drawn as
 * hexagons; conditional edges are dotted and labelled with their branch.
 */
export function toMermaid(graph: MermaidInput): string {
  const lines = ['flowchart TD']

  for (const name of graph.nodeNames) {
    const whens = graph.interrupts.filter((p) => p.node === name).map((p) => p.when)
    if (whens.length > 0) {
      lines.push(`  ${name}{{"${name} (interrupt ${whens.join(', ')})"}}`)
    }
  }

  lines.push(`  ${ref(START)} --> ${graph.entry}`)

  const bySource = new Map(graph.edges.map((e) => [e.from, e]))
  for (const name of graph.nodeNames) {
    const edge = bySource.get(name)
    if (edge) {
      edge.targets.forEach((to, i) => {
        const label = edge.labels[i] ?? ''
        lines.push(
          label === ''
            ? `  ${name} --> ${ref(to)}`
            : `  ${name} -. ${label} .-> ${ref(to)}`,
        )
      })
    } else if (graph.terminals.includes(name)) {
      lines.push(`  ${name} --> ${ref(END)}`)
    }
  }

  return lines.join('\n')
}
