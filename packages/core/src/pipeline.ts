import { EventEmitter } from 'events';
import type { StepName } from './errors.js';

export type PipelinePhase =
  | 'idle'
  | 'building'
  | 'generating-bindings'
  | 'staging'
  | 'serving'
  | 'interrupted'
  | 'terminated';

const TRANSITIONS: Record<PipelinePhase, readonly PipelinePhase[]> = {
  idle: ['building'],
  building: ['generating-bindings', 'terminated'],
  'generating-bindings': ['staging', 'terminated'],
  staging: ['serving', 'terminated'],
  serving: ['interrupted', 'terminated'],
  interrupted: [],
  terminated: [],
};

export interface PipelineStep {
  name: StepName;
  /** Phase the pipeline is in while this step runs */
  phase: PipelinePhase;
  run: () => Promise<void>;
}

export interface StepTiming {
  name: StepName;
  duration: number;
}

/**
 * Pipeline - ordered steps with stop-at-first-failure semantics
 *
 * Events:
 * - 'state' (phase, previous)
 * - 'step-start' (name)
 * - 'step-complete' (timing)
 * - 'step-failed' (name, error)
 */
export class Pipeline extends EventEmitter {
  private phase: PipelinePhase = 'idle';
  private timings: StepTiming[] = [];

  constructor(private readonly steps: readonly PipelineStep[]) {
    super();
  }

  getPhase(): PipelinePhase {
    return this.phase;
  }

  getTimings(): StepTiming[] {
    return [...this.timings];
  }

  /**
   * Run every step in order. The first failure terminates the pipeline and is rethrown.
   */
  async run(): Promise<void> {
    if (this.phase !== 'idle') {
      throw new Error(`Pipeline already started (phase: ${this.phase})`);
    }

    for (const step of this.steps) {
      this.transition(step.phase);
      this.emit('step-start', step.name);
      const startTime = Date.now();

      try {
        await step.run();
      } catch (err) {
        this.transition('terminated');
        this.emit('step-failed', step.name, err);
        throw err;
      }

      const timing: StepTiming = { name: step.name, duration: Date.now() - startTime };
      this.timings.push(timing);
      this.emit('step-complete', timing);
    }
  }

  /**
   * External interrupt while serving
   */
  interrupt(): void {
    this.transition('interrupted');
  }

  /**
   * The final step ended on its own
   */
  terminate(): void {
    this.transition('terminated');
  }

  private transition(next: PipelinePhase): void {
    if (!TRANSITIONS[this.phase].includes(next)) {
      throw new Error(`Invalid pipeline transition: ${this.phase} -> ${next}`);
    }
    const previous = this.phase;
    this.phase = next;
    this.emit('state', next, previous);
  }
}
