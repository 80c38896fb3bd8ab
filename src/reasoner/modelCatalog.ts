import fs from 'fs';
import { z } from 'zod';

export type ModelPurpose = 'interview' | 'analysis' | 'enhance';

const ModelEntrySchema = z.object({
  id: z.string().min(1),
  label: z.string().optional(),
  purposes: z.array(z.enum(['interview', 'analysis', 'enhance'])).min(1),
  healthy: z.boolean().default(true)
});

const CatalogFileSchema = z.object({ models: z.array(ModelEntrySchema) });

export type ModelEntry = z.infer<typeof ModelEntrySchema>;

/**
 * Ordered model preferences with health flags. Injected into the gateway so
 * the list can be reloaded at runtime without a redeploy.
 */
export class ModelCatalog {
  private entries: ModelEntry[];

  constructor(entries: ModelEntry[]) {
    this.entries = entries.map(e => ({ ...e }));
  }

  list(): readonly ModelEntry[] {
    return this.entries;
  }

  has(id: string): boolean {
    return this.entries.some(e => e.id === id);
  }

  isHealthy(id: string): boolean {
    return this.entries.some(e => e.id === id && e.healthy);
  }

  /**
   * Requested models that are known and healthy, then the catalog's healthy
   * models for the purpose, without duplicates.
   */
  preferences(purpose: ModelPurpose, requested: readonly string[] = []): string[] {
    const out: string[] = [];
    for (const id of requested) {
      if (!this.has(id)) {
        console.warn(`[ModelCatalog] requested model ${id} is not in the catalog, skipping`);
        continue;
      }
      if (!this.isHealthy(id)) {
        console.warn(`[ModelCatalog] requested model ${id} is marked unhealthy, skipping`);
        continue;
      }
      if (!out.includes(id)) out.push(id);
    }
    for (const e of this.entries) {
      if (e.healthy && e.purposes.includes(purpose) && !out.includes(e.id)) out.push(e.id);
    }
    return out;
  }

  replace(entries: ModelEntry[]) {
    this.entries = entries.map(e => ({ ...e }));
  }
}

export function parseCatalog(raw: unknown): ModelEntry[] {
  const parsed = CatalogFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid model catalog: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ')}`);
  }
  return parsed.data.models;
}

export function loadModelCatalog(filePath: string): ModelCatalog {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  return new ModelCatalog(parseCatalog(raw));
}
