import { z } from 'zod';
import { fail, InvalidQueryError, NotFoundError, ok, type Result } from './errors';

export const diseaseNameSchema = z.string().trim().min(1, 'disease name is required').brand<'DiseaseName'>();

// Lookups match stored keys exactly, so no trimming here.
const catalogKeySchema = z.string().min(1).brand<'DiseaseName'>();

export type DiseaseName = z.infer<typeof diseaseNameSchema>;

const codeSchema = z.string().trim().min(1);

export const codeEntrySchema = z.object({
  primaryCode: codeSchema,
  secondaryCode: codeSchema,
});

export type CodeEntry = Readonly<z.infer<typeof codeEntrySchema>>;

export const codeFieldsSchema = codeEntrySchema.partial();

export type CodeFields = z.infer<typeof codeFieldsSchema>;

export type CatalogSeed = Map<string, CodeEntry> | Record<string, CodeEntry>;

function seedPairs(seed: CatalogSeed): [string, CodeEntry][] {
  return seed instanceof Map ? [...seed.entries()] : Object.entries(seed);
}

/**
 * In-memory catalog of canonical disease names and their ICD-11 / TM2 codes.
 *
 * Entries are frozen and replaced wholesale on update, so a reader holding an
 * entry never sees a half-applied change. Nothing here is persisted.
 */
export class DiseaseCatalog {
  private readonly entriesByName = new Map<DiseaseName, CodeEntry>();

  constructor(seed: CatalogSeed = {}) {
    for (const [rawName, entry] of seedPairs(seed)) {
      const name = diseaseNameSchema.parse(rawName);
      if (this.entriesByName.has(name)) throw new Error(`duplicate disease name in seed: "${name}"`);
      this.entriesByName.set(name, Object.freeze(codeEntrySchema.parse(entry)));
    }
  }

  get size(): number {
    return this.entriesByName.size;
  }

  get(name: string): CodeEntry | undefined {
    const parsed = catalogKeySchema.safeParse(name);
    return parsed.success ? this.entriesByName.get(parsed.data) : undefined;
  }

  names(): DiseaseName[] {
    return [...this.entriesByName.keys()];
  }

  entries(): [DiseaseName, CodeEntry][] {
    return [...this.entriesByName.entries()];
  }

  update(name: string, fields: CodeFields): Result<CodeEntry, NotFoundError | InvalidQueryError> {
    const parsed = catalogKeySchema.safeParse(name);
    const current = parsed.success ? this.entriesByName.get(parsed.data) : undefined;
    if (!parsed.success || !current) return fail(new NotFoundError(name));

    const changes = codeFieldsSchema.safeParse(fields);
    if (!changes.success) return fail(new InvalidQueryError('codes must be non-empty strings'));

    const next: CodeEntry = Object.freeze({
      primaryCode: changes.data.primaryCode ?? current.primaryCode,
      secondaryCode: changes.data.secondaryCode ?? current.secondaryCode,
    });
    this.entriesByName.set(parsed.data, next);
    return ok(next);
  }

  delete(name: string): Result<DiseaseName, NotFoundError> {
    const parsed = catalogKeySchema.safeParse(name);
    if (!parsed.success || !this.entriesByName.delete(parsed.data)) return fail(new NotFoundError(name));
    return ok(parsed.data);
  }
}
