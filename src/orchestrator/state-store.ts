import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { Checkpoint } from './states';

const messageSchema = z.object({
  agent: z.string(),
  text: z.string(),
  kind: z.enum(['info', 'thinking', 'success', 'warning', 'error']),
  timestamp: z.string(),
});

const nodeSchema = z.enum(['planner', 'coder', 'tester', 'reviewer']);

const stateSchema = z.object({
  requirements: z.string(),
  plan: z.string().optional(),
  code: z.string().optional(),
  tests: z.string().optional(),
  review: z.string().optional(),
  messages: z.array(messageSchema),
  errors: z.array(z.string()),
  warnings: z.array(z.string()),
  filesCreated: z.array(z.string()),
  filesModified: z.array(z.string()),
  metrics: z.object({
    testCoverage: z.number().optional(),
    codeQualityScore: z.number().optional(),
    reviewScore: z.number().optional(),
  }),
  phase: z.enum(['planning', 'coding', 'testing', 'reviewing', 'complete', 'failed']),
  iteration: z.number().int().min(1),
  status: z.enum(['in_progress', 'completed', 'failed', 'needs_revision']),
  currentAgent: nodeSchema.optional(),
  retries: z.object({ coderTester: z.number().int(), reviewerCoder: z.number().int() }),
  startedAt: z.string(),
  updatedAt: z.string(),
});

export const checkpointSchema = z.object({
  sessionId: z.string(),
  step: z.number().int(),
  node: nodeSchema,
  next: z.union([nodeSchema, z.literal('__end__')]),
  savedAt: z.string(),
  state: stateSchema,
});

/** Append-only log of state snapshots, keyed by session id */
export interface CheckpointStore {
  append(checkpoint: Checkpoint): Promise<void>;
  list(sessionId: string): Promise<Checkpoint[]>;
  latest(sessionId: string): Promise<Checkpoint | null>;
}

export class MemoryCheckpointStore implements CheckpointStore {
  private logs = new Map<string, Checkpoint[]>();

  append(checkpoint: Checkpoint): Promise<void> {
    const log = this.logs.get(checkpoint.sessionId) ?? [];
    log.push(structuredClone(checkpoint));
    this.logs.set(checkpoint.sessionId, log);
    return Promise.resolve();
  }

  list(sessionId: string): Promise<Checkpoint[]> {
    return Promise.resolve((this.logs.get(sessionId) ?? []).map((c) => structuredClone(c)));
  }

  latest(sessionId: string): Promise<Checkpoint | null> {
    const log = this.logs.get(sessionId);
    const last = log?.[log.length - 1];
    return Promise.resolve(last ? structuredClone(last) : null);
  }
}

/**
 * One JSON line per checkpoint under `<dir>/<sessionId>/checkpoints.jsonl`.
 * Lines that fail to parse or validate (a torn final write) are skipped.
 */
export class FileCheckpointStore implements CheckpointStore {
  constructor(private directory: string) {}

  async append(checkpoint: Checkpoint): Promise<void> {
    const file = this.fileFor(checkpoint.sessionId);
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.appendFile(file, `${JSON.stringify(checkpoint)}\n`, 'utf-8');
  }

  async list(sessionId: string): Promise<Checkpoint[]> {
    let data: string;
    try {
      data = await fs.readFile(this.fileFor(sessionId), 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }

    const checkpoints: Checkpoint[] = [];
    for (const line of data.split('\n')) {
      if (!line.trim()) continue;
      const parsed = checkpointSchema.safeParse(parseJson(line));
      if (parsed.success) checkpoints.push(parsed.data);
    }
    return checkpoints;
  }

  async latest(sessionId: string): Promise<Checkpoint | null> {
    const checkpoints = await this.list(sessionId);
    return checkpoints[checkpoints.length - 1] ?? null;
  }

  private fileFor(sessionId: string): string {
    if (!/^[\w-]+$/.test(sessionId)) {
      throw new Error(`Invalid session id: ${sessionId}`);
    }
    return path.join(this.directory, sessionId, 'checkpoints.jsonl');
  }
}

function parseJson(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
