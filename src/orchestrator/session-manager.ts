import crypto from 'crypto';
import path from 'path';
import type { Config } from '../config/validator';
import { createDefaultCollaborators } from '../collaborators';
import type { Collaborators } from '../collaborators/types';
import { AgentCoordinator } from './agent-coordinator';
import { createAgentCoordinator, createNodeRuntime } from './register-handlers';
import { SessionNotFoundError } from './errors';
import { ConsoleWorkflowLogger } from './logger';
import type { WorkflowLogger } from './logger';
import { Router } from './router';
import type { RouterLimits } from './router';
import { FileCheckpointStore } from './state-store';
import type { CheckpointStore } from './state-store';
import type { RouteTarget, WorkflowState, WorkflowSummary } from './states';
import { WorkflowOrchestrator } from './workflow';
import type { StepUpdate } from './workflow';
import { createInitialState, getWorkflowSummary } from './workflow-state';

export interface SessionManagerOptions {
  coordinator: AgentCoordinator;
  checkpoints?: CheckpointStore;
  limits?: RouterLimits;
  maxSteps?: number;
  /** Builds the logger for a session (default: ConsoleWorkflowLogger) */
  loggerFactory?: (sessionId: string) => WorkflowLogger;
}

export interface SessionInfo {
  sessionId: string;
  requirements: string;
  state: WorkflowState;
  next: RouteTarget;
  step: number;
  createdAt: string;
  updatedAt: string;
}

interface SessionRecord {
  orchestrator: WorkflowOrchestrator;
  createdAt: string;
  updatedAt: string;
}

export function routerLimitsFromConfig(config: Config): RouterLimits {
  return {
    maxCoderTesterRetries: config.workflow.max_coder_tester_retries,
    maxReviewerRetries: config.workflow.max_reviewer_retries,
    testPassThreshold: config.workflow.test_pass_threshold,
    reviewApprovalThreshold: config.workflow.review_approval_threshold,
  };
}

/**
 * Session control surface: start sessions, drive them, read their
 * summaries and restore them from checkpoints.
 */
export class SessionManager {
  private sessions = new Map<string, SessionRecord>();
  private coordinator: AgentCoordinator;
  private checkpoints?: CheckpointStore;
  private limits?: RouterLimits;
  private maxSteps?: number;
  private loggerFactory: (sessionId: string) => WorkflowLogger;

  constructor(options: SessionManagerOptions) {
    this.coordinator = options.coordinator;
    this.checkpoints = options.checkpoints;
    this.limits = options.limits;
    this.maxSteps = options.maxSteps;
    this.loggerFactory = options.loggerFactory ?? ((sessionId) => new ConsoleWorkflowLogger(sessionId));
  }

  /** Manager wired from configuration with the default adapters and file checkpoints */
  static fromConfig(config: Config, options: { collaborators?: Collaborators; logger?: WorkflowLogger } = {}): SessionManager {
    const collaborators = options.collaborators ?? createDefaultCollaborators(config, options.logger);
    const coordinator = createAgentCoordinator(createNodeRuntime(config, collaborators, options.logger));
    const logger = options.logger;

    return new SessionManager({
      coordinator,
      checkpoints: new FileCheckpointStore(path.resolve(config.workspace.checkpoint_dir)),
      limits: routerLimitsFromConfig(config),
      maxSteps: config.workflow.max_steps,
      loggerFactory: logger ? () => logger : undefined,
    });
  }

  /** Create a session for `requirements`; nothing runs until it is streamed */
  start(requirements: string): string {
    const sessionId = crypto.randomUUID();
    this.register(sessionId, createInitialState(requirements), 'planner', 0);
    return sessionId;
  }

  /** Async iterable of node updates until the session ends */
  async *stream(sessionId: string): AsyncGenerator<StepUpdate, WorkflowSummary, void> {
    const record = this.getRecord(sessionId);
    return yield* record.orchestrator.stream();
  }

  /** Drive a session to its end */
  async run(sessionId: string): Promise<WorkflowSummary> {
    return this.getRecord(sessionId).orchestrator.run();
  }

  summary(sessionId: string): WorkflowSummary {
    return getWorkflowSummary(this.getRecord(sessionId).orchestrator.getStatus().state);
  }

  getSession(sessionId: string): SessionInfo {
    const record = this.getRecord(sessionId);
    const status = record.orchestrator.getStatus();
    return {
      sessionId,
      requirements: status.state.requirements,
      state: status.state,
      next: status.next,
      step: status.step,
      createdAt: record.createdAt,
      updatedAt: record.updatedAt,
    };
  }

  listSessions(): string[] {
    return [...this.sessions.keys()];
  }

  /**
   * Rebuild a session from its latest checkpoint, replacing any in-memory
   * copy, and drive it on from the recorded next target.
   * @throws SessionNotFoundError when no checkpoint exists for the id.
   */
  async resume(sessionId: string): Promise<WorkflowSummary> {
    await this.restore(sessionId);
    return this.run(sessionId);
  }

  /** @throws SessionNotFoundError when no checkpoint exists for the id. */
  async restore(sessionId: string): Promise<void> {
    const checkpoint = this.checkpoints ? await this.checkpoints.latest(sessionId) : null;
    if (!checkpoint) {
      throw new SessionNotFoundError(sessionId);
    }
    this.register(sessionId, checkpoint.state, checkpoint.next, checkpoint.step, checkpoint.state.startedAt);
  }

  private register(sessionId: string, state: WorkflowState, next: RouteTarget, step: number, createdAt = new Date().toISOString()): void {
    const orchestrator = new WorkflowOrchestrator({
      coordinator: this.coordinator,
      initialState: state,
      next,
      step,
      sessionId,
      router: new Router(this.limits),
      maxSteps: this.maxSteps,
      checkpoints: this.checkpoints,
      logger: this.loggerFactory(sessionId),
    });

    const record: SessionRecord = { orchestrator, createdAt, updatedAt: createdAt };
    orchestrator.events.onStep((event) => {
      record.updatedAt = event.timestamp;
    });
    this.sessions.set(sessionId, record);
  }

  private getRecord(sessionId: string): SessionRecord {
    const record = this.sessions.get(sessionId);
    if (!record) {
      throw new SessionNotFoundError(sessionId);
    }
    return record;
  }
}
