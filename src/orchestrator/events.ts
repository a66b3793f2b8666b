import { EventEmitter } from 'events';
import type { NodeName, RouteTarget, WorkflowState } from './states';

export interface StepEvent {
  sessionId: string;
  step: number;
  node: NodeName;
  next: RouteTarget;
  state: WorkflowState;
  timestamp: string;
}

export class WorkflowEvents extends EventEmitter {
  emitStep(event: StepEvent): void {
    this.emit('step', event);
  }

  onStep(listener: (event: StepEvent) => void): this {
    return this.on('step', listener);
  }
}
