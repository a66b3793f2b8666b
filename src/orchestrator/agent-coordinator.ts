import type { NodeName, WorkflowState } from './states';

/**
 * A node function: receives the current (read-only) state and resolves to
 * the next one. Nodes never mutate their input.
 */
export type NodeHandler = (state: Readonly<WorkflowState>) => Promise<WorkflowState>;

/**
 * AgentCoordinator maps each workflow node to the function that runs it.
 *
 * Handlers are registered externally, either with the real agents built
 * from configuration or with lightweight fakes in tests.
 */
export class AgentCoordinator {
  private handlers = new Map<NodeName, NodeHandler>();

  registerHandler(node: NodeName, handler: NodeHandler): void {
    this.handlers.set(node, handler);
  }

  hasHandler(node: NodeName): boolean {
    return this.handlers.has(node);
  }

  /**
   * Execute the handler registered for the given node.
   * @throws Error if no handler is registered for the node.
   */
  async execute(node: NodeName, state: WorkflowState): Promise<WorkflowState> {
    const handler = this.handlers.get(node);
    if (!handler) {
      throw new Error(`No handler registered for node: ${node}`);
    }
    return handler(state);
  }

  getRegisteredNodes(): NodeName[] {
    return [...this.handlers.keys()];
  }
}
