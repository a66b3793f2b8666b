import crypto from 'crypto';
import { AgentCoordinator } from './agent-coordinator';
import { Router } from './router';
import { assertTransition } from './state-machine';
import type { CheckpointStore } from './state-store';
import { WorkflowEvents } from './events';
import { NodeExecutionError, describeError } from './errors';
import { ConsoleWorkflowLogger } from './logger';
import type { WorkflowLogger } from './logger';
import { END } from './states';
import type { NodeName, RouteTarget, WorkflowState, WorkflowSummary } from './states';
import { isTerminalPhase } from './transitions';
import { endSession, getWorkflowSummary } from './workflow-state';

export { ConsoleWorkflowLogger } from './logger';
export type { WorkflowLogger } from './logger';

export const DEFAULT_MAX_STEPS = 50;

const HARNESS_AGENT = 'harness';

// ── Options ─────────────────────────────────────────────────────────────

/** Configuration for creating a WorkflowOrchestrator */
export interface WorkflowOptions {
  /** Coordinator with a handler registered for every node */
  coordinator: AgentCoordinator;
  /** State to start from: a fresh one, or the state of a checkpoint */
  initialState: WorkflowState;
  /** Node to run first (default: planner) */
  next?: RouteTarget;
  /** Node invocations already spent, when resuming (default: 0) */
  step?: number;
  /** Unique identifier for this session (auto-generated if omitted) */
  sessionId?: string;
  router?: Router;
  /** Node invocations allowed before the session is failed (default: 50) */
  maxSteps?: number;
  /** Snapshot log; no checkpoints are written when omitted */
  checkpoints?: CheckpointStore;
  /** Logger implementation (defaults to ConsoleWorkflowLogger) */
  logger?: WorkflowLogger;
  events?: WorkflowEvents;
}

/**
 * What the stream yields after every node. When the step limit stops a
 * session, one last update names the node that was refused, keeps the
 * step count and carries the failed state.
 */
export interface StepUpdate {
  node: NodeName;
  state: WorkflowState;
  next: RouteTarget;
  step: number;
}

// ── Orchestrator ────────────────────────────────────────────────────────

/**
 * WorkflowOrchestrator drives one session: it runs the next node, validates
 * the phase change, asks the Router where to go, and repeats until the
 * Router ends the session or the step limit is reached.
 *
 * A node that throws (or produces an illegal transition) fails the session;
 * nothing escapes to the caller.
 */
export class WorkflowOrchestrator {
  readonly events: WorkflowEvents;
  private coordinator: AgentCoordinator;
  private router: Router;
  private checkpoints?: CheckpointStore;
  private logger: WorkflowLogger;
  private sessionId: string;
  private maxSteps: number;
  private state: WorkflowState;
  private next: RouteTarget;
  private step: number;
  private running = false;

  constructor(options: WorkflowOptions) {
    this.sessionId = options.sessionId ?? crypto.randomUUID();
    this.coordinator = options.coordinator;
    this.router = options.router ?? new Router();
    this.checkpoints = options.checkpoints;
    this.logger = options.logger ?? new ConsoleWorkflowLogger(this.sessionId);
    this.events = options.events ?? new WorkflowEvents();
    this.maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
    this.state = options.initialState;
    this.next = options.next ?? 'planner';
    this.step = options.step ?? 0;
  }

  // ── Public API ──────────────────────────────────────────────────────

  /**
   * Run nodes until the session ends, yielding after each one.
   * @throws Error if the session is already being driven.
   */
  async *stream(): AsyncGenerator<StepUpdate, WorkflowSummary, void> {
    if (this.running) {
      throw new Error(`Session ${this.sessionId} is already running`);
    }
    this.running = true;

    try {
      if (!this.isFinished()) {
        this.logger.info('Starting workflow', { sessionId: this.sessionId, next: this.next, step: this.step });
      }

      while (!this.isFinished()) {
        const node = this.next;
        if (node === END) break;

        if (this.step >= this.maxSteps) {
          const reason = `Step limit reached after ${this.step} node invocations`;
          this.logger.error(reason, { maxSteps: this.maxSteps });
          this.state = endSession(this.state, HARNESS_AGENT, reason, 'failed');
          this.next = END;
          yield await this.publish(node);
          break;
        }

        yield await this.executeNode(node);
      }

      return this.buildResult();
    } finally {
      this.running = false;
    }
  }

  /** Drive the session to its end and return the summary */
  async run(): Promise<WorkflowSummary> {
    const iterator = this.stream();
    let result = await iterator.next();
    while (!result.done) {
      result = await iterator.next();
    }
    return result.value;
  }

  /** Snapshot of the current session position */
  getStatus(): { sessionId: string; state: WorkflowState; next: RouteTarget; step: number; finished: boolean } {
    return {
      sessionId: this.sessionId,
      state: this.state,
      next: this.next,
      step: this.step,
      finished: this.isFinished(),
    };
  }

  getSessionId(): string {
    return this.sessionId;
  }

  // ── Node Execution ──────────────────────────────────────────────────

  private isFinished(): boolean {
    return this.next === END || this.state.status === 'failed' || isTerminalPhase(this.state.phase);
  }

  private async executeNode(node: NodeName): Promise<StepUpdate> {
    this.step++;
    const before = this.state;
    const nodeStart = Date.now();
    this.logger.info(`Executing: ${node}`, { step: this.step });

    try {
      const produced = await this.coordinator.execute(node, before);
      assertTransition(before, produced);

      const decision = this.router.route(node, produced);
      assertTransition(produced, decision.state);

      this.state = decision.state;
      this.next = decision.next;
      this.logger.info(`Completed: ${node} (${Date.now() - nodeStart}ms)`);
      this.logger.debug('Route decision', { from: node, to: decision.next, phase: decision.state.phase, iteration: decision.state.iteration });
    } catch (error) {
      const failure = new NodeExecutionError(node, error);
      this.logger.error(`Failed: ${node} (${Date.now() - nodeStart}ms)`, { error: describeError(error) });
      this.state = endSession(before, node, failure.message, 'failed');
      this.next = END;
    }

    return this.publish(node);
  }

  /** Checkpoint the current position and announce it */
  private async publish(node: NodeName): Promise<StepUpdate> {
    await this.saveCheckpoint(node);

    const update: StepUpdate = { node, state: this.state, next: this.next, step: this.step };
    this.events.emitStep({ sessionId: this.sessionId, ...update, timestamp: new Date().toISOString() });
    return update;
  }

  private async saveCheckpoint(node: NodeName): Promise<void> {
    if (!this.checkpoints) return;

    try {
      await this.checkpoints.append({
        sessionId: this.sessionId,
        step: this.step,
        node,
        next: this.next,
        savedAt: new Date().toISOString(),
        state: this.state,
      });
    } catch (error) {
      this.logger.warn('Checkpoint write failed', { step: this.step, error: describeError(error) });
    }
  }

  // ── Helpers ─────────────────────────────────────────────────────────

  private buildResult(): WorkflowSummary {
    const summary = getWorkflowSummary(this.state);
    this.logger.info('Workflow result', {
      status: summary.status,
      phase: summary.phase,
      iteration: summary.iteration,
      steps: this.step,
      errors: summary.errorCount,
    });
    return summary;
  }
}
