export { extractFiles, toExtractedFiles, isTestFilename } from './extraction/extractor';
export type { ExtractedFile, ExtractOptions } from './extraction/extractor';
export { DETECTION_RULES, detectFilename } from './extraction/rules';
export type { DetectionRule } from './extraction/rules';

export * from './orchestrator/states';
export * from './orchestrator/workflow-state';
export * from './orchestrator/errors';
export { Router, DEFAULT_ROUTER_LIMITS } from './orchestrator/router';
export type { RouterLimits, RouteDecision } from './orchestrator/router';
export { assertTransition } from './orchestrator/state-machine';
export { WorkflowOrchestrator, DEFAULT_MAX_STEPS } from './orchestrator/workflow';
export type { WorkflowOptions, StepUpdate } from './orchestrator/workflow';
export { SessionManager } from './orchestrator/session-manager';
export type { SessionManagerOptions, SessionInfo } from './orchestrator/session-manager';
export { AgentCoordinator } from './orchestrator/agent-coordinator';
export type { NodeHandler } from './orchestrator/agent-coordinator';
export { createAgentCoordinator, createNodeRuntime } from './orchestrator/register-handlers';
export { MemoryCheckpointStore, FileCheckpointStore } from './orchestrator/state-store';
export type { CheckpointStore } from './orchestrator/state-store';
export { WorkflowEvents } from './orchestrator/events';
export type { StepEvent } from './orchestrator/events';
export { ConsoleWorkflowLogger } from './orchestrator/logger';
export type { WorkflowLogger } from './orchestrator/logger';

export { NODE_PROFILES, runNode } from './agents';
export type { NodeProfile, NodeRuntime, PromptContext } from './agents';

export * from './collaborators';

export { loadConfig } from './config/loader';
export type { DeepPartial, LoadConfigOptions } from './config/loader';
export type { Config, AgentSettings } from './config/validator';
export { defaults as DEFAULT_CONFIG } from './config/defaults';
