import type { TExecutionOrder, TWorkflowAST } from '../ast/types.js';

export type ControlFlowGraph = {
  /** Node ids in document order */
  nodeIds: string[];
  graph: Map<string, string[]>;
  inDegree: Map<string, number>;
};

/**
 * Build the dependency graph restricted to connections whose endpoints are
 * both known nodes. Parallel connections between the same pair are kept as
 * separate edges, each contributing to the destination's in-degree.
 */
export function buildControlFlowGraph(workflow: TWorkflowAST): ControlFlowGraph {
  const nodeIds = workflow.nodes.map((node) => node.id);
  const graph = new Map<string, string[]>();
  const inDegree = new Map<string, number>();
  nodeIds.forEach((id) => {
    graph.set(id, []);
    inDegree.set(id, 0);
  });
  workflow.connections.forEach((conn) => {
    const successors = graph.get(conn.sourceId);
    if (!successors || !graph.has(conn.destinationId)) {
      return;
    }
    successors.push(conn.destinationId);
    inDegree.set(conn.destinationId, (inDegree.get(conn.destinationId) || 0) + 1);
  });
  return { nodeIds, graph, inDegree };
}

/**
 * Perform Kahn's topological sort algorithm on the dependency graph
 *
 * Algorithm:
 * 1. Seed a FIFO queue with zero in-degree nodes, in document order
 * 2. Dequeue the front, append it, decrement each successor's in-degree
 * 3. Enqueue a successor the moment it reaches zero
 * 4. Repeat until the queue drains
 *
 * Never throws. When the graph has a cycle the nodes on or behind it never
 * reach zero; they are reported in `unscheduled` and `complete` is false.
 */
export function performKahnsTopologicalSort(controlFlowGraph: ControlFlowGraph): TExecutionOrder {
  const order: string[] = [];
  const inDegree = new Map(controlFlowGraph.inDegree);
  const queue = controlFlowGraph.nodeIds.filter((id) => inDegree.get(id) === 0);

  for (let head = 0; head < queue.length; head++) {
    const node = queue[head];
    order.push(node);
    const successors = controlFlowGraph.graph.get(node) || [];
    successors.forEach((successor) => {
      const newDegree = (inDegree.get(successor) || 0) - 1;
      inDegree.set(successor, newDegree);
      if (newDegree === 0) {
        queue.push(successor);
      }
    });
  }

  const scheduled = new Set(order);
  const unscheduled = controlFlowGraph.nodeIds.filter((id) => !scheduled.has(id));
  return { order, unscheduled, complete: unscheduled.length === 0 };
}

export function determineExecutionOrder(workflow: TWorkflowAST): TExecutionOrder {
  return performKahnsTopologicalSort(buildControlFlowGraph(workflow));
}
