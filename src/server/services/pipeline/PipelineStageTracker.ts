/**
 * Pipeline Stage Tracker
 *
 * Enforces the forward-only stage order of a run (no stage is entered twice or out of
 * order), records stage timings and forwards progress events to the run's listener.
 */

import type { Logger } from 'pino';
import {
  PIPELINE_STAGES,
  type PipelineProgressEvent,
  type PipelineProgressListener,
  type PipelineStage,
  type StageRecord,
} from '../../types/progress.js';
import { getErrorMessage } from '../../types/errors.js';

type EventPayload<E> = E extends PipelineProgressEvent ? Omit<E, 'runId' | 'timestamp'> : never;

export class PipelineStageTracker {
  private readonly records: StageRecord[] = [];
  private currentStage: PipelineStage | null = null;

  constructor(
    private readonly runId: string,
    private readonly logger: Logger,
    private readonly listener?: PipelineProgressListener,
    private readonly now: () => Date = () => new Date()
  ) {}

  get current(): PipelineStage | null {
    return this.currentStage;
  }

  /**
   * Snapshot of all stage records so far
   */
  get stages(): StageRecord[] {
    return this.records.map(record => ({ ...record }));
  }

  /**
   * Enter a stage; the previous stage must have been completed
   *
   * @throws {Error} on a backward or repeated transition
   */
  begin(stage: PipelineStage): void {
    const currentIndex = this.currentStage ? PIPELINE_STAGES.indexOf(this.currentStage) : -1;
    const nextIndex = PIPELINE_STAGES.indexOf(stage);
    const open = this.openRecord();

    if (nextIndex <= currentIndex || open) {
      throw new Error(`Illegal stage transition ${this.currentStage ?? 'START'} -> ${stage}`);
    }

    this.currentStage = stage;
    this.records.push({ stage, status: 'in_progress', startedAt: this.now() });
    this.logger.info({ stage }, `Stage ${stage} started`);
    this.emit({ type: 'stage_started', stage });
  }

  complete(): void {
    const record = this.requireOpenRecord();
    const completedAt = this.now();
    record.status = 'completed';
    record.completedAt = completedAt;
    record.durationMs = completedAt.getTime() - record.startedAt.getTime();

    this.logger.info({ stage: record.stage, durationMs: record.durationMs }, `Stage ${record.stage} completed`);
    this.emit({ type: 'stage_completed', stage: record.stage, durationMs: record.durationMs });
  }

  fail(error: string): void {
    const record = this.openRecord();
    if (!record) {
      return;
    }
    const completedAt = this.now();
    record.status = 'failed';
    record.completedAt = completedAt;
    record.durationMs = completedAt.getTime() - record.startedAt.getTime();
    record.error = error;

    this.emit({ type: 'stage_failed', stage: record.stage, error });
  }

  /**
   * Close the open stage, if any, as cancelled. Later stages may still begin.
   */
  cancel(): void {
    const record = this.openRecord();
    if (!record) {
      return;
    }
    const completedAt = this.now();
    record.status = 'cancelled';
    record.completedAt = completedAt;
    record.durationMs = completedAt.getTime() - record.startedAt.getTime();

    this.logger.info({ stage: record.stage }, `Stage ${record.stage} cancelled`);
  }

  /**
   * Forward an event to the listener; listener errors are logged and never reach the run
   */
  emit(payload: EventPayload<PipelineProgressEvent>): void {
    if (!this.listener) {
      return;
    }
    const event: PipelineProgressEvent = { ...payload, runId: this.runId, timestamp: this.now() };
    try {
      this.listener(event);
    } catch (error) {
      this.logger.warn({ eventType: event.type, error: getErrorMessage(error) }, 'Progress listener threw');
    }
  }

  private openRecord(): StageRecord | undefined {
    const last = this.records[this.records.length - 1];
    return last && last.status === 'in_progress' ? last : undefined;
  }

  private requireOpenRecord(): StageRecord {
    const record = this.openRecord();
    if (!record) {
      throw new Error('No stage in progress');
    }
    return record;
  }
}
