export type StageRole = 'loader' | 'joiner' | 'classifier' | 'aggregator' | 'recommender';

export interface StageStarted {
  stage: StageRole;
  rows?: number;
}

export interface StageCompleted {
  stage: StageRole;
  rows: number;
  durationMs: number;
}

export interface RowClassified {
  symbol: string;
  position: number;
  label: string;
  known: boolean;
}

export interface RowFailed {
  symbol: string;
  position: number;
  error: string;
}

export interface PipelineEvents {
  stage_started: StageStarted;
  stage_completed: StageCompleted;
  row_classified: RowClassified;
  row_failed: RowFailed;
}

export type PipelineTopic = keyof PipelineEvents;

export interface PipelineMessage<K extends PipelineTopic = PipelineTopic> {
  id: string;
  sender: string;
  role: StageRole;
  topic: K;
  timestamp: number;
  payload: PipelineEvents[K];
}
