// src/cloud_types.ts
import { z } from 'zod';

/*
 * Формат облачного API. Значения входов/выходов приходят JSON-строками:
 * число 8 лежит в value как "8".
 */

export const CloudValueSchema = z.object({
  name: z.string(),
  type: z.string(),
  units: z.string().nullable().optional(),
  value: z.string().nullable(),
});
export type CloudInput = z.infer<typeof CloudValueSchema>;
export type CloudOutput = z.infer<typeof CloudValueSchema>;

export const ExperimentSchema = z.object({
  id: z.string(),
  name: z.string(),
  type: z.string().optional(),
  inputs: z.array(CloudValueSchema),
});
export type Experiment = z.infer<typeof ExperimentSchema>;

export const ModelSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().nullable().optional(),
  modelVersions: z.array(z.string()),
});
export type CloudModel = z.infer<typeof ModelSchema>;

export const ModelVersionSchema = z.object({
  id: z.string(),
  modelId: z.string(),
  version: z.number().int(),
  experiments: z.array(ExperimentSchema),
});
export type ModelVersion = z.infer<typeof ModelVersionSchema>;

export const RunStatusSchema = z.enum(['FRESH', 'RUNNING', 'COMPLETED', 'FAILED', 'STOPPED']);
export type RunStatus = z.infer<typeof RunStatusSchema>;

export const RunStateSchema = z.object({
  status: RunStatusSchema,
  message: z.string().nullable().optional(),
});
export type RunState = z.infer<typeof RunStateSchema>;

export const OutputsSchema = z.array(CloudValueSchema);

export type RunRequest = {
  experimentType: 'SIMULATION';
  inputs: CloudInput[];
};

/** JSON-строку из облака превращаем в значение; не-JSON отдаём как есть */
export function decodeValue(raw: string | null): unknown {
  if (raw === null) return null;
  try {
    const decoded: unknown = JSON.parse(raw);
    return decoded;
  } catch {
    return raw;
  }
}
