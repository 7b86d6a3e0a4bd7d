/**
 * Progress Event Types for Pipeline Runs
 *
 * These types define the stages of a forecasting run and the events emitted while it executes
 */

/**
 * Pipeline stages in execution order. No stage is revisited; DONE is terminal.
 */
export const PIPELINE_STAGES = [
  'INGESTING',
  'NORMALIZING',
  'INDEXING',
  'PLANNING',
  'FORECASTING',
  'AGGREGATING',
  'ALERTING',
  'DONE',
] as const;

export type PipelineStage = (typeof PIPELINE_STAGES)[number];

export type StageStatus = 'in_progress' | 'completed' | 'failed' | 'cancelled';

/**
 * Timing and outcome of one stage
 */
export interface StageRecord {
  stage: PipelineStage;
  status: StageStatus;
  startedAt: Date;
  completedAt?: Date;
  durationMs?: number;
  error?: string;
}

/**
 * Progress event types
 */
export type PipelineProgressEventType =
  | 'stage_started'
  | 'stage_completed'
  | 'stage_failed'
  | 'batch_completed'
  | 'product_failed';

/**
 * Base progress event structure
 */
interface BaseProgressEvent {
  type: PipelineProgressEventType;
  runId: string;
  timestamp: Date;
}

export interface StageStartedEvent extends BaseProgressEvent {
  type: 'stage_started';
  stage: PipelineStage;
}

export interface StageCompletedEvent extends BaseProgressEvent {
  type: 'stage_completed';
  stage: PipelineStage;
  durationMs: number;
}

export interface StageFailedEvent extends BaseProgressEvent {
  type: 'stage_failed';
  stage: PipelineStage;
  error: string;
}

/**
 * A batch worker finished (successfully or not) and passed the join barrier
 */
export interface BatchCompletedEvent extends BaseProgressEvent {
  type: 'batch_completed';
  batchIndex: number;
  forecastsProduced: number;
  productsFailed: number;
  productsSkipped: number;
}

export interface ProductFailedEvent extends BaseProgressEvent {
  type: 'product_failed';
  batchIndex: number;
  productCode: string;
  code: string;
  reason: string;
}

/**
 * Union of all pipeline progress events
 */
export type PipelineProgressEvent =
  | StageStartedEvent
  | StageCompletedEvent
  | StageFailedEvent
  | BatchCompletedEvent
  | ProductFailedEvent;

export type PipelineProgressListener = (event: PipelineProgressEvent) => void;
