import { AxiosError } from 'axios';
import type { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { CloudClient } from '../src/cloud_client.js';
import { CloudError } from '../src/errors.js';
import { demoOutputs, demoVersion } from './fakes.js';

type Reply = { status?: number; data: unknown };
type Handler = (body: unknown) => Reply;

/** облако в памяти: ключ маршрута — "METHOD url" */
function fakeTransport(routes: Record<string, Handler>) {
  const calls: string[] = [];
  const bodies: unknown[] = [];
  const auth: unknown[] = [];

  const adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig) => {
    const key = `${(config.method ?? 'get').toUpperCase()} ${config.url ?? ''}`;
    calls.push(key);
    auth.push(config.headers.get('Authorization'));
    const body: unknown = typeof config.data === 'string' ? JSON.parse(config.data) : undefined;
    bodies.push(body);

    const handler = routes[key];
    const reply: Reply = handler ? handler(body) : { status: 404, data: { message: `no route ${key}` } };
    const response: AxiosResponse = {
      data: reply.data,
      status: reply.status ?? 200,
      statusText: String(reply.status ?? 200),
      headers: {},
      config,
    };
    if (response.status >= 400) {
      throw new AxiosError(`Request failed with status code ${response.status}`, 'ERR_BAD_RESPONSE', config, null, response);
    }
    return response;
  };

  return { adapter, calls, bodies, auth };
}

const model = { id: 'model-1', name: 'Service System Demo', description: null, modelVersions: ['ver-1', 'ver-2'] };

function sequence(...states: string[]): Handler {
  let i = 0;
  return () => {
    const status = states[Math.min(i, states.length - 1)];
    i++;
    return { data: { status, message: status === 'FAILED' ? 'division by zero' : null } };
  };
}

describe('CloudClient', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('sends the raw API key and lists models', async () => {
    const t = fakeTransport({ 'GET models': () => ({ data: [model] }) });
    const client = new CloudClient({ apiKey: 'test-key', adapter: t.adapter });

    expect(await client.listModels()).toEqual([model]);
    expect(t.auth).toEqual(['test-key']);
  });

  it('resolves the latest version through the model name', async () => {
    const t = fakeTransport({
      'GET models/name/Service%20System%20Demo': () => ({ data: model }),
      'GET versions/ver-2': () => ({ data: demoVersion }),
    });
    const client = new CloudClient({ apiKey: 'test-key', adapter: t.adapter });

    const version = await client.getLatestModelVersion('Service System Demo');
    expect(version.id).toBe('ver-2');
    expect(t.calls).toEqual(['GET models/name/Service%20System%20Demo', 'GET versions/ver-2']);
  });

  it('fails for a model without versions', async () => {
    const t = fakeTransport({
      'GET models/name/Empty': () => ({ data: { ...model, name: 'Empty', modelVersions: [] } }),
    });
    const client = new CloudClient({ apiKey: 'test-key', adapter: t.adapter });

    await expect(client.getLatestModelVersion('Empty')).rejects.toThrow('model "Empty" has no versions');
  });

  it('turns HTTP errors into CloudError with status and vendor message', async () => {
    const t = fakeTransport({
      'GET models/name/Nope': () => ({ status: 404, data: { message: 'Model not found' } }),
    });
    const client = new CloudClient({ apiKey: 'test-key', adapter: t.adapter });

    const err = await client.getModelByName('Nope').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CloudError);
    expect(err).toMatchObject({
      status: 404,
      message: 'Cloud API GET models/name/Nope failed with 404: Model not found',
    });
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it('rejects a response of the wrong shape', async () => {
    const t = fakeTransport({ 'GET models': () => ({ data: { models: [] } }) });
    const client = new CloudClient({ apiKey: 'test-key', adapter: t.adapter });

    await expect(client.listModels()).rejects.toThrow('unexpected response from GET models (body: Expected array, received object)');
  });

  it('copies experiment inputs and encodes new values', () => {
    const client = new CloudClient({ apiKey: 'test-key' });
    const inputs = client.createInputsFromExperiment(demoVersion, 'Baseline');

    inputs.setInput('Server capacity', 8);
    expect(inputs.getInput('Server capacity')).toBe(8);
    expect(inputs.toJSON()[0]).toEqual({ name: 'Server capacity', type: 'INTEGER', units: null, value: '8' });
    expect(demoVersion.experiments[0]?.inputs[0]?.value).toBe('4');
  });

  it('rejects unknown experiments and inputs', () => {
    const client = new CloudClient({ apiKey: 'test-key' });

    expect(() => client.createInputsFromExperiment(demoVersion, 'Optimization')).toThrow(
      'experiment "Optimization" not found in model version 2'
    );
    const inputs = client.createInputsFromExperiment(demoVersion, 'Baseline');
    expect(() => inputs.setInput('Arrival rate', 1)).toThrow('input "Arrival rate" not found in experiment "Baseline"');
  });

  describe('getOutputsAndRunIfAbsent', () => {
    function setup(states: Handler) {
      const t = fakeTransport({
        'POST versions/ver-2/run': states,
        'POST versions/ver-2/runs': () => ({ data: { status: 'RUNNING' } }),
        'POST versions/ver-2/results': () => ({ data: demoOutputs }),
      });
      const client = new CloudClient({ apiKey: 'test-key', adapter: t.adapter, pollIntervalMs: 0 });
      const inputs = client.createInputsFromExperiment(demoVersion, 'Baseline');
      inputs.setInput('Server capacity', 8);
      return { t, simulation: client.createSimulation(inputs) };
    }

    it('starts a fresh run, waits for it, then reads outputs', async () => {
      const { t, simulation } = setup(sequence('FRESH', 'RUNNING', 'COMPLETED'));

      const outputs = await simulation.getOutputsAndRunIfAbsent();

      expect(t.calls).toEqual([
        'POST versions/ver-2/run',
        'POST versions/ver-2/runs',
        'POST versions/ver-2/run',
        'POST versions/ver-2/run',
        'POST versions/ver-2/results',
      ]);
      expect(t.bodies[1]).toEqual({
        experimentType: 'SIMULATION',
        inputs: [
          { name: 'Server capacity', type: 'INTEGER', units: null, value: '8' },
          { name: '{STOP_TIME}', type: 'DOUBLE', units: 'MINUTE', value: '1000.0' },
        ],
      });
      expect(outputs.value('Mean queue size|Mean queue size')).toBe(0.87);
      expect(outputs.value('Queue size stats')).toEqual({ mean: 0.87, max: 9 });
      expect(outputs.getRawOutputs()).toEqual(demoOutputs);
    });

    it('reads outputs of a completed run without starting it', async () => {
      const { t, simulation } = setup(sequence('COMPLETED'));

      await simulation.getOutputsAndRunIfAbsent();

      expect(t.calls).toEqual(['POST versions/ver-2/run', 'POST versions/ver-2/results']);
    });

    it('fails when the run fails', async () => {
      const { simulation } = setup(sequence('RUNNING', 'FAILED'));

      await expect(simulation.getOutputsAndRunIfAbsent()).rejects.toThrow('run failed: division by zero');
    });

    it('fails when the run is stopped', async () => {
      const { simulation } = setup(sequence('RUNNING', 'STOPPED'));

      await expect(simulation.getOutputsAndRunIfAbsent()).rejects.toThrow('run stopped: no details');
    });

    it('gives up after the run timeout', async () => {
      const t = fakeTransport({ 'POST versions/ver-2/run': sequence('RUNNING') });
      const client = new CloudClient({ apiKey: 'test-key', adapter: t.adapter, pollIntervalMs: 5, runTimeoutMs: 1 });
      const simulation = client.createSimulation(client.createInputsFromExperiment(demoVersion, 'Baseline'));

      await expect(simulation.waitForCompletion()).rejects.toThrow('run did not finish within 1 ms (last status RUNNING)');
    });

    it('rejects an unknown output name', async () => {
      const { simulation } = setup(sequence('COMPLETED'));
      const outputs = await simulation.getOutputsAndRunIfAbsent();

      expect(() => outputs.value('Throughput')).toThrow(
        'output "Throughput" not found (available: Mean queue size|Mean queue size, Utilization|Server utilization, Queue size stats)'
      );
    });
  });
});
