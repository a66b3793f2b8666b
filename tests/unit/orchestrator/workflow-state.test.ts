import {
  addFilesCreated,
  addFilesModified,
  advancePhase,
  appendError,
  appendMessage,
  appendWarning,
  createInitialState,
  endSession,
  getWorkflowSummary,
  withFields,
  withMetrics,
} from '../../../src/orchestrator/workflow-state';

describe('workflow state record', () => {
  const start = new Date('2024-05-01T10:00:00.000Z');

  describe('createInitialState', () => {
    it('should start in planning with empty artifacts and iteration 1', () => {
      const state = createInitialState('Build a calculator', start);

      expect(state).toEqual({
        requirements: 'Build a calculator',
        messages: [],
        errors: [],
        warnings: [],
        filesCreated: [],
        filesModified: [],
        metrics: {},
        phase: 'planning',
        iteration: 1,
        status: 'in_progress',
        retries: { coderTester: 0, reviewerCoder: 0 },
        startedAt: '2024-05-01T10:00:00.000Z',
        updatedAt: '2024-05-01T10:00:00.000Z',
      });
    });
  });

  describe('mutators', () => {
    it('should never change their input', () => {
      const state = createInitialState('x', start);
      const snapshot = JSON.stringify(state);

      appendMessage(state, 'planner', 'hello');
      appendError(state, 'boom');
      appendWarning(state, 'careful');
      addFilesCreated(state, ['a.py']);
      withMetrics(state, { testCoverage: 100 });
      withFields(state, { plan: 'p' });

      expect(JSON.stringify(state)).toBe(snapshot);
    });

    it('should append messages without touching earlier ones', () => {
      const first = appendMessage(createInitialState('x'), 'planner', 'one', 'thinking');
      const second = appendMessage(first, 'coder', 'two');

      expect(second.messages).toHaveLength(2);
      expect(second.messages[0]).toBe(first.messages[0]);
      expect(second.messages[1]).toMatchObject({ agent: 'coder', text: 'two', kind: 'info' });
    });

    it('should union file names', () => {
      let state = addFilesCreated(createInitialState('x'), ['a.py', 'b.py']);
      state = addFilesCreated(state, ['b.py', 'c.py']);
      state = addFilesModified(state, ['b.py']);
      state = addFilesModified(state, ['b.py']);

      expect(state.filesCreated).toEqual(['a.py', 'b.py', 'c.py']);
      expect(state.filesModified).toEqual(['b.py']);
    });

    it('should merge metrics', () => {
      const state = withMetrics(withMetrics(createInitialState('x'), { testCoverage: 0 }), { reviewScore: 90 });

      expect(state.metrics).toEqual({ testCoverage: 0, reviewScore: 90 });
    });

    it('should bump updatedAt but keep startedAt', () => {
      const state = withFields(createInitialState('x', start), { plan: 'p' });

      expect(state.startedAt).toBe('2024-05-01T10:00:00.000Z');
      expect(state.updatedAt).not.toBe('2024-05-01T10:00:00.000Z');
    });
  });

  describe('advancePhase', () => {
    it('should walk the fixed order and complete at the end', () => {
      let state = createInitialState('x');
      const phases: string[] = [];
      for (let i = 0; i < 4; i++) {
        state = advancePhase(state);
        phases.push(state.phase);
      }

      expect(phases).toEqual(['coding', 'testing', 'reviewing', 'complete']);
      expect(state.status).toBe('completed');
    });

    it('should send a phase outside the order to complete', () => {
      const state = advancePhase(withFields(createInitialState('x'), { phase: 'failed' }));

      expect(state.phase).toBe('complete');
      expect(state.status).toBe('completed');
    });

    it('should reset a revision status while moving forward', () => {
      const state = advancePhase(withFields(createInitialState('x'), { phase: 'coding', status: 'needs_revision' }));

      expect(state.phase).toBe('testing');
      expect(state.status).toBe('in_progress');
    });
  });

  describe('endSession', () => {
    it('should record the reason and fail the session', () => {
      const state = endSession(createInitialState('x'), 'router', 'No files', 'failed');

      expect(state.errors).toEqual(['No files']);
      expect(state.messages[0]).toMatchObject({ agent: 'router', text: 'No files', kind: 'error' });
      expect(state.phase).toBe('failed');
      expect(state.status).toBe('failed');
    });

    it('should close a capped session as complete', () => {
      const state = endSession(createInitialState('x'), 'router', 'Cap', 'complete');

      expect(state.phase).toBe('complete');
      expect(state.status).toBe('completed');
    });
  });

  describe('getWorkflowSummary', () => {
    it('should report counts, files, metrics and elapsed time', () => {
      let state = createInitialState('x', start);
      state = appendError(appendWarning(appendWarning(state, 'w1'), 'w2'), 'e1');
      state = addFilesModified(addFilesCreated(state, ['main.py']), ['main.py']);
      state = withMetrics(state, { testCoverage: 100, reviewScore: 90 });
      state = { ...state, updatedAt: '2024-05-01T10:00:02.500Z' };

      expect(getWorkflowSummary(state)).toEqual({
        phase: 'planning',
        iteration: 1,
        status: 'in_progress',
        errorCount: 1,
        warningCount: 2,
        filesCreated: ['main.py'],
        filesModified: ['main.py'],
        metrics: { testCoverage: 100, reviewScore: 90 },
        elapsedTime: 2500,
      });
    });
  });
});
