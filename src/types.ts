import type { CloudInput, CloudOutput } from './cloud_types.js';

export type RunRequest = {
  server_capacity: number;
  model_name?: string;
  experiment_name?: string;
};

/** ответ POST /simulations/run */
export interface SimulationResult {
  simulation_id: string;
  server_capacity: number;
  mean_queue_size: number;
  server_utilization: number;
  raw_outputs: CloudOutput[];
  status: 'completed';
}

export type RunRecordStatus = 'completed' | 'failed';

/** запись истории: то же плюс контекст запуска */
export interface SimulationRecord {
  id: string;
  model_name: string;
  experiment_name: string;
  version_id: string | null;
  server_capacity: number;
  status: RunRecordStatus;
  mean_queue_size: number | null;
  server_utilization: number | null;
  raw_outputs: CloudOutput[] | null;
  error: string | null;
  started_at: string;
  finished_at: string;
  duration_ms: number;
}

export interface ModelSummary {
  id: string;
  name: string;
  description: string | null;
  versions: number;
  latest_version_id: string | null;
}

export interface ModelDescription {
  model_name: string;
  version_id: string;
  version: number;
  experiments: Array<{
    name: string;
    inputs: Array<Omit<CloudInput, 'value'> & { value: unknown }>;
  }>;
}
