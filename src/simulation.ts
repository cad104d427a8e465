// src/simulation.ts
import { differenceInMilliseconds } from 'date-fns';
import { v4 as uuidv4 } from 'uuid';

import { decodeValue } from './cloud_types.js';
import type { ModelVersion } from './cloud_types.js';
import type { SimulationCloud } from './cloud_client.js';
import { CloudError, NotFoundError } from './errors.js';
import type { ListParams, RunStore } from './runs_store.js';
import type {
  ModelDescription,
  ModelSummary,
  RunRequest,
  SimulationRecord,
  SimulationResult,
} from './types.js';

/** имена входа/выходов в демо-модели */
export type SimulationSettings = {
  capacityInput: string;
  meanQueueOutput: string;
  utilizationOutput: string;
};

export type ResolvedRunRequest = Required<RunRequest>;

export type RunOutcome = {
  result: SimulationResult;
  version: ModelVersion;
};

function metric(name: string, value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new CloudError(`output "${name}" is not a number: ${JSON.stringify(value)}`);
  }
  return value;
}

/**
 * Один прогон: последняя версия → входы эксперимента → ёмкость сервера →
 * симуляция → результаты (с запуском, если их ещё нет).
 */
export async function runSimulation(
  cloud: SimulationCloud,
  req: ResolvedRunRequest,
  settings: SimulationSettings
): Promise<RunOutcome> {
  const version = await cloud.getLatestModelVersion(req.model_name);
  const inputs = cloud.createInputsFromExperiment(version, req.experiment_name);
  inputs.setInput(settings.capacityInput, req.server_capacity);
  const simulation = cloud.createSimulation(inputs);
  const outputs = await simulation.getOutputsAndRunIfAbsent();

  const result: SimulationResult = {
    simulation_id: uuidv4(),
    server_capacity: req.server_capacity,
    mean_queue_size: metric(settings.meanQueueOutput, outputs.value(settings.meanQueueOutput)),
    server_utilization: metric(settings.utilizationOutput, outputs.value(settings.utilizationOutput)),
    raw_outputs: outputs.getRawOutputs(),
    status: 'completed',
  };
  return { result, version };
}

export type SimulationServiceOptions = {
  cloud: SimulationCloud;
  store: RunStore;
  settings: SimulationSettings;
  defaults: { modelName: string; experimentName: string };
};

export class SimulationService {
  constructor(private readonly opts: SimulationServiceOptions) {}

  async listModels(): Promise<ModelSummary[]> {
    const models = await this.opts.cloud.listModels();
    return models.map((m) => ({
      id: m.id,
      name: m.name,
      description: m.description ?? null,
      versions: m.modelVersions.length,
      latest_version_id: m.modelVersions[m.modelVersions.length - 1] ?? null,
    }));
  }

  async describeModel(name: string): Promise<ModelDescription> {
    const version = await this.opts.cloud.getLatestModelVersion(name);
    return {
      model_name: name,
      version_id: version.id,
      version: version.version,
      experiments: version.experiments.map((e) => ({
        name: e.name,
        inputs: e.inputs.map((i) => ({ name: i.name, type: i.type, units: i.units, value: decodeValue(i.value) })),
      })),
    };
  }

  async run(req: RunRequest): Promise<SimulationResult> {
    const resolved: ResolvedRunRequest = {
      server_capacity: req.server_capacity,
      model_name: req.model_name ?? this.opts.defaults.modelName,
      experiment_name: req.experiment_name ?? this.opts.defaults.experimentName,
    };
    const startedAt = new Date();
    const base = {
      model_name: resolved.model_name,
      experiment_name: resolved.experiment_name,
      server_capacity: resolved.server_capacity,
      started_at: startedAt.toISOString(),
    };

    let outcome: RunOutcome;
    try {
      outcome = await runSimulation(this.opts.cloud, resolved, this.opts.settings);
    } catch (e) {
      const finishedAt = new Date();
      const failed: SimulationRecord = {
        ...base,
        id: uuidv4(),
        version_id: null,
        status: 'failed',
        mean_queue_size: null,
        server_utilization: null,
        raw_outputs: null,
        error: e instanceof Error ? e.message : String(e),
        finished_at: finishedAt.toISOString(),
        duration_ms: differenceInMilliseconds(finishedAt, startedAt),
      };
      try {
        await this.opts.store.save(failed);
      } catch (saveErr) {
        // исходная ошибка важнее
        console.error('failed to record failed run:', saveErr);
      }
      throw e;
    }

    const { result, version } = outcome;
    const finishedAt = new Date();
    await this.opts.store.save({
      ...base,
      id: result.simulation_id,
      version_id: version.id,
      status: 'completed',
      mean_queue_size: result.mean_queue_size,
      server_utilization: result.server_utilization,
      raw_outputs: result.raw_outputs,
      error: null,
      finished_at: finishedAt.toISOString(),
      duration_ms: differenceInMilliseconds(finishedAt, startedAt),
    });
    return result;
  }

  async getRun(id: string): Promise<SimulationRecord> {
    const rec = await this.opts.store.get(id);
    if (!rec) throw new NotFoundError(`simulation ${id} not found`);
    return rec;
  }

  async listRuns(p: ListParams): Promise<SimulationRecord[]> {
    return this.opts.store.list(p);
  }
}
