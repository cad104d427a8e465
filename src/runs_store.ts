// src/runs_store.ts
import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

import { CloudValueSchema } from './cloud_types.js';
import type { SimulationRecord } from './types.js';

export type ListParams = { limit: number; offset: number };

export interface RunStore {
  save(rec: SimulationRecord): Promise<void>;
  get(id: string): Promise<SimulationRecord | null>;
  /** новые сверху */
  list(p: ListParams): Promise<SimulationRecord[]>;
}

const SimulationRecordSchema = z.object({
  id: z.string(),
  model_name: z.string(),
  experiment_name: z.string(),
  version_id: z.string().nullable(),
  server_capacity: z.number(),
  status: z.enum(['completed', 'failed']),
  mean_queue_size: z.number().nullable(),
  server_utilization: z.number().nullable(),
  raw_outputs: z.array(CloudValueSchema).nullable(),
  error: z.string().nullable(),
  started_at: z.string(),
  finished_at: z.string(),
  duration_ms: z.number(),
});

/** история в памяти процесса; держит не больше maxRows последних записей */
export class MemoryRunStore implements RunStore {
  private readonly rows = new Map<string, SimulationRecord>();

  constructor(private readonly maxRows = 1000) {}

  async save(rec: SimulationRecord) {
    if (!this.rows.has(rec.id) && this.rows.size >= this.maxRows) {
      // Map хранит порядок вставки: первый ключ — самый старый
      for (const oldest of this.rows.keys()) {
        this.rows.delete(oldest);
        break;
      }
    }
    this.rows.set(rec.id, rec);
  }

  async get(id: string) {
    return this.rows.get(id) ?? null;
  }

  async list({ limit, offset }: ListParams) {
    // reverse: при равном started_at позже сохранённый идёт первым
    return [...this.rows.values()]
      .reverse()
      .sort((a, b) => b.started_at.localeCompare(a.started_at))
      .slice(offset, offset + limit);
  }
}

export class SupabaseRunStore implements RunStore {
  constructor(
    private readonly supa: SupabaseClient,
    private readonly table = 'cloud_runs'
  ) {}

  async save(rec: SimulationRecord) {
    const { error } = await this.supa.from(this.table).upsert(rec, { onConflict: 'id' });
    if (error) throw error;
  }

  async get(id: string) {
    const { data, error } = await this.supa.from(this.table).select('*').eq('id', id).maybeSingle();
    if (error) throw error;
    return data ? this.parseRows(SimulationRecordSchema, data) : null;
  }

  async list({ limit, offset }: ListParams) {
    const { data, error } = await this.supa
      .from(this.table)
      .select('*')
      .order('started_at', { ascending: false })
      .range(offset, offset + limit - 1);
    if (error) throw error;
    return this.parseRows(z.array(SimulationRecordSchema), data ?? []);
  }

  // битая строка в базе — ошибка сервера, а не клиента: не ZodError
  private parseRows<S extends z.ZodTypeAny>(schema: S, data: unknown): z.output<S> {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const detail = issue ? `${issue.path.join('.') || 'row'}: ${issue.message}` : 'invalid row';
      throw new Error(`invalid row in ${this.table} (${detail})`);
    }
    return parsed.data;
  }
}
