/**
 * Query API for read-only workflow inspection
 * All functions are pure and do not modify the workflow
 */

import type { TConnectionAST, TNodeAST, TToolType, TWorkflowAST } from '../ast/types.js';

// ============================================================================
// NODE QUERIES
// ============================================================================

/**
 * Get a single node by ID
 *
 * @example
 * ```typescript
 * const node = getNode(workflow, '2');
 * if (node) {
 *   console.log(`Tool type: ${node.toolType}`);
 * }
 * ```
 */
export function getNode(ast: TWorkflowAST, nodeId: string): TNodeAST | undefined {
  return ast.nodes.find((n) => n.id === nodeId);
}

export function hasNode(ast: TWorkflowAST, nodeId: string): boolean {
  return ast.nodes.some((n) => n.id === nodeId);
}

/** All nodes of a tool type, in document order */
export function getNodesByToolType(ast: TWorkflowAST, toolType: TToolType): TNodeAST[] {
  return ast.nodes.filter((n) => n.toolType === toolType);
}

// ============================================================================
// CONNECTION QUERIES
// ============================================================================

/** Connections ending at `nodeId`, in connection-list order */
export function getConnectionsInto(ast: TWorkflowAST, nodeId: string): TConnectionAST[] {
  return ast.connections.filter((c) => c.destinationId === nodeId);
}

/** Connections starting at `nodeId`, in connection-list order */
export function getConnectionsFrom(ast: TWorkflowAST, nodeId: string): TConnectionAST[] {
  return ast.connections.filter((c) => c.sourceId === nodeId);
}

/**
 * Ids of nodes feeding into `nodeId`, one per connection, in connection-list
 * order. Ids that name no node are included.
 */
export function getUpstreamNodeIds(ast: TWorkflowAST, nodeId: string): string[] {
  return getConnectionsInto(ast, nodeId).map((c) => c.sourceId);
}

/**
 * Ids of nodes `nodeId` feeds into, one per connection, in connection-list
 * order. Ids that name no node are included.
 */
export function getDownstreamNodeIds(ast: TWorkflowAST, nodeId: string): string[] {
  return getConnectionsFrom(ast, nodeId).map((c) => c.destinationId);
}

/** Connections with at least one endpoint naming no node */
export function findDanglingConnections(ast: TWorkflowAST): TConnectionAST[] {
  const ids = new Set(ast.nodes.map((n) => n.id));
  return ast.connections.filter((c) => !ids.has(c.sourceId) || !ids.has(c.destinationId));
}

/** Nodes with no connection at all, in either direction */
export function findIsolatedNodes(ast: TWorkflowAST): TNodeAST[] {
  const connected = new Set<string>();
  for (const c of ast.connections) {
    connected.add(c.sourceId);
    connected.add(c.destinationId);
  }
  return ast.nodes.filter((n) => !connected.has(n.id));
}
