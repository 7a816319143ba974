import { randomUUID } from 'crypto';
import type { PipelineStage } from '../types/index.js';
import { LogLevel, LoggingService } from '../utils/LoggingService.js';
import type { Logger } from '../utils/LoggingService.js';

export interface StageTransition {
  from: PipelineStage;
  to: PipelineStage;
  at: Date;
}

export type StageChangeListener = (from: PipelineStage, to: PipelineStage, context: RunContext) => void;

export interface RunContextOptions {
  runId?: string;
  logger?: Logger;
  onStageChange?: StageChangeListener;
}

const NEXT_STAGE: Readonly<Record<PipelineStage, PipelineStage | null>> = {
  Idle: 'BuildingBibliography',
  BuildingBibliography: 'SplittingSections',
  SplittingSections: 'ResolvingCitations',
  ResolvingCitations: 'Merging',
  Merging: 'Done',
  Done: null,
  Failed: null,
};

/**
 * Per-run state threaded through the pipeline: current stage, the ordered
 * transition history, the run's logger and an optional progress listener.
 */
export class RunContext {
  readonly runId: string;
  readonly logger: Logger;
  private currentStage: PipelineStage = 'Idle';
  private readonly transitions: StageTransition[] = [];
  private readonly onStageChange?: StageChangeListener;

  constructor(options: RunContextOptions = {}) {
    this.runId = options.runId ?? randomUUID();
    this.logger = options.logger ?? new LoggingService('manuscript-assembler', LogLevel.WARN);
    this.onStageChange = options.onStageChange;
  }

  get stage(): PipelineStage {
    return this.currentStage;
  }

  get history(): readonly StageTransition[] {
    return this.transitions;
  }

  get isFinished(): boolean {
    return this.currentStage === 'Done' || this.currentStage === 'Failed';
  }

  /**
   * Move to the next stage. Only the fixed forward order is accepted.
   *
   * @throws Error if `to` does not follow the current stage
   */
  advance(to: PipelineStage): void {
    if (NEXT_STAGE[this.currentStage] !== to) {
      throw new Error(`Invalid stage transition ${this.currentStage} -> ${to}`);
    }
    this.record(to);
  }

  /**
   * Enter `Failed` from any unfinished stage. Returns the stage that failed.
   */
  fail(): PipelineStage {
    const failedStage = this.currentStage;
    if (!this.isFinished) {
      this.record('Failed');
    }
    return failedStage;
  }

  private record(to: PipelineStage): void {
    const from = this.currentStage;
    this.currentStage = to;
    this.transitions.push({ from, to, at: new Date() });
    this.logger.stateChange(`run ${this.runId}`, from, to);
    this.onStageChange?.(from, to, this);
  }
}

export function createRunContext(options: RunContextOptions = {}): RunContext {
  return new RunContext(options);
}
