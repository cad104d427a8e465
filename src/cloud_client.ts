// src/cloud_client.ts
import axios, { type AxiosAdapter, type AxiosInstance, type AxiosRequestConfig } from 'axios';
import { addMilliseconds, isAfter } from 'date-fns';
import type { z } from 'zod';

import { CloudError } from './errors.js';
import {
  ModelSchema,
  ModelVersionSchema,
  OutputsSchema,
  RunStateSchema,
  decodeValue,
} from './cloud_types.js';
import type {
  CloudInput,
  CloudModel,
  CloudOutput,
  ModelVersion,
  RunRequest,
  RunState,
} from './cloud_types.js';

export const DEFAULT_BASE_URL = 'https://cloud.anylogic.com/api/open/8.5.0/';

/* ---------- контракт, на который опирается сервис (и фейки в тестах) ---------- */

export interface SimulationInputs {
  readonly version: ModelVersion;
  readonly experimentName: string;
  setInput(name: string, value: unknown): void;
  getInput(name: string): unknown;
  toJSON(): CloudInput[];
}

export interface SimulationOutputs {
  names(): string[];
  value(name: string): unknown;
  getRawOutputs(): CloudOutput[];
}

export interface CloudSimulation {
  getOutputsAndRunIfAbsent(): Promise<SimulationOutputs>;
}

export interface SimulationCloud {
  listModels(): Promise<CloudModel[]>;
  getLatestModelVersion(modelName: string): Promise<ModelVersion>;
  createInputsFromExperiment(version: ModelVersion, experimentName: string): SimulationInputs;
  createSimulation(inputs: SimulationInputs): CloudSimulation;
}

export type CloudClientOptions = {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  pollIntervalMs?: number;
  runTimeoutMs?: number;
  /** подмена транспорта (тесты) */
  adapter?: AxiosAdapter;
};

/* ---------- входы ---------- */

export class Inputs implements SimulationInputs {
  private readonly items: CloudInput[];

  constructor(
    readonly version: ModelVersion,
    readonly experimentName: string,
    items: CloudInput[]
  ) {
    // копия: эксперимент из версии не трогаем
    this.items = items.map((i) => ({ ...i }));
  }

  setInput(name: string, value: unknown) {
    const item = this.items.find((i) => i.name === name);
    if (!item) throw new CloudError(`input "${name}" not found in experiment "${this.experimentName}"`);
    item.value = JSON.stringify(value);
  }

  getInput(name: string): unknown {
    const item = this.items.find((i) => i.name === name);
    if (!item) throw new CloudError(`input "${name}" not found in experiment "${this.experimentName}"`);
    return decodeValue(item.value);
  }

  toJSON(): CloudInput[] {
    return this.items.map((i) => ({ ...i }));
  }
}

/* ---------- выходы ---------- */

export class Outputs implements SimulationOutputs {
  constructor(private readonly raw: CloudOutput[]) {}

  names() {
    return this.raw.map((o) => o.name);
  }

  value(name: string): unknown {
    const out = this.raw.find((o) => o.name === name);
    if (!out) throw new CloudError(`output "${name}" not found (available: ${this.names().join(', ') || 'none'})`);
    return decodeValue(out.value);
  }

  getRawOutputs(): CloudOutput[] {
    return this.raw;
  }
}

/* ---------- прогон ---------- */

export class Simulation implements CloudSimulation {
  constructor(
    private readonly client: CloudClient,
    readonly inputs: SimulationInputs,
    private readonly pollIntervalMs: number,
    private readonly runTimeoutMs: number
  ) {}

  private request(): RunRequest {
    return { experimentType: 'SIMULATION', inputs: this.inputs.toJSON() };
  }

  async run(): Promise<RunState> {
    return this.client.startRun(this.inputs.version.id, this.request());
  }

  async getStatus(): Promise<RunState> {
    return this.client.getRunState(this.inputs.version.id, this.request());
  }

  /** опрашиваем статус, пока прогон не завершится */
  async waitForCompletion(): Promise<RunState> {
    const deadline = addMilliseconds(new Date(), this.runTimeoutMs);
    for (;;) {
      const state = await this.getStatus();
      if (state.status === 'COMPLETED') return state;
      if (state.status === 'FAILED' || state.status === 'STOPPED') {
        throw new CloudError(`run ${state.status.toLowerCase()}: ${state.message || 'no details'}`);
      }
      if (isAfter(new Date(), deadline)) {
        throw new CloudError(`run did not finish within ${this.runTimeoutMs} ms (last status ${state.status})`);
      }
      await new Promise((r) => setTimeout(r, this.pollIntervalMs));
    }
  }

  async getOutputs(): Promise<Outputs> {
    const raw = await this.client.getRunOutputs(this.inputs.version.id, this.request());
    return new Outputs(raw);
  }

  /** готовые результаты, либо запуск и ожидание */
  async getOutputsAndRunIfAbsent(): Promise<Outputs> {
    const state = await this.getStatus();
    if (state.status === 'FRESH') await this.run();
    if (state.status !== 'COMPLETED') await this.waitForCompletion();
    return this.getOutputs();
  }
}

/* ---------- клиент ---------- */

export class CloudClient implements SimulationCloud {
  private readonly http: AxiosInstance;
  private readonly pollIntervalMs: number;
  private readonly runTimeoutMs: number;

  constructor(opts: CloudClientOptions) {
    if (!opts.apiKey) throw new Error('Cloud API key is required');

    this.pollIntervalMs = opts.pollIntervalMs ?? 2_000;
    this.runTimeoutMs = opts.runTimeoutMs ?? 600_000;

    this.http = axios.create({
      baseURL: opts.baseUrl ?? DEFAULT_BASE_URL,
      timeout: opts.timeoutMs ?? 30_000,
      adapter: opts.adapter,
      headers: {
        'Content-Type': 'application/json',
        'User-Agent': 'cloud-sim-gateway/1.0',
        // облако ждёт голый ключ, без "Bearer "
        Authorization: opts.apiKey,
      },
    });

    this.http.interceptors.response.use(
      (response) => response,
      (error: unknown) => {
        const err = toCloudError(error);
        console.error('Cloud API error:', { message: err.message, status: err.status });
        throw err;
      }
    );
  }

  private async call<S extends z.ZodTypeAny>(schema: S, config: AxiosRequestConfig): Promise<z.output<S>> {
    const res = await this.http.request<unknown>(config);
    const parsed = schema.safeParse(res.data);
    if (!parsed.success) {
      const where = `${(config.method ?? 'get').toUpperCase()} ${config.url ?? ''}`;
      const issue = parsed.error.issues[0];
      const detail = issue ? `${issue.path.join('.') || 'body'}: ${issue.message}` : 'invalid body';
      throw new CloudError(`unexpected response from ${where} (${detail})`);
    }
    return parsed.data;
  }

  async listModels(): Promise<CloudModel[]> {
    return this.call(ModelSchema.array(), { method: 'get', url: 'models' });
  }

  async getModelByName(name: string): Promise<CloudModel> {
    return this.call(ModelSchema, { method: 'get', url: `models/name/${encodeURIComponent(name)}` });
  }

  async getModelVersion(versionId: string): Promise<ModelVersion> {
    return this.call(ModelVersionSchema, { method: 'get', url: `versions/${encodeURIComponent(versionId)}` });
  }

  async getLatestModelVersion(modelName: string): Promise<ModelVersion> {
    const model = await this.getModelByName(modelName);
    const latestId = model.modelVersions[model.modelVersions.length - 1];
    if (!latestId) throw new CloudError(`model "${modelName}" has no versions`);
    return this.getModelVersion(latestId);
  }

  createInputsFromExperiment(version: ModelVersion, experimentName: string): Inputs {
    const experiment = version.experiments.find((e) => e.name === experimentName);
    if (!experiment) {
      throw new CloudError(`experiment "${experimentName}" not found in model version ${version.version}`);
    }
    return new Inputs(version, experimentName, experiment.inputs);
  }

  createSimulation(inputs: SimulationInputs): Simulation {
    return new Simulation(this, inputs, this.pollIntervalMs, this.runTimeoutMs);
  }

  async startRun(versionId: string, body: RunRequest): Promise<RunState> {
    return this.call(RunStateSchema, { method: 'post', url: `versions/${encodeURIComponent(versionId)}/runs`, data: body });
  }

  async getRunState(versionId: string, body: RunRequest): Promise<RunState> {
    return this.call(RunStateSchema, { method: 'post', url: `versions/${encodeURIComponent(versionId)}/run`, data: body });
  }

  async getRunOutputs(versionId: string, body: RunRequest): Promise<CloudOutput[]> {
    return this.call(OutputsSchema, { method: 'post', url: `versions/${encodeURIComponent(versionId)}/results`, data: body });
  }
}

function detailOf(data: unknown): string | undefined {
  if (typeof data === 'string' && data) return data;
  if (data && typeof data === 'object' && 'message' in data && typeof data.message === 'string') {
    return data.message;
  }
  return undefined;
}

function toCloudError(error: unknown): CloudError {
  if (error instanceof CloudError) return error;
  if (axios.isAxiosError(error)) {
    const where = `${(error.config?.method ?? 'get').toUpperCase()} ${error.config?.url ?? ''}`;
    const status = error.response?.status;
    if (status !== undefined) {
      const detail = detailOf(error.response?.data) ?? error.message;
      return new CloudError(`Cloud API ${where} failed with ${status}: ${detail}`, { status, cause: error });
    }
    return new CloudError(`Cloud API ${where} failed: ${error.message}`, { cause: error });
  }
  return new CloudError(error instanceof Error ? error.message : String(error), { cause: error });
}
