import { Router } from 'express';
import { z } from 'zod';
import type { DiseaseCatalog } from '../services/catalog';
import { errorOutcome, matchToCondition, outcome, toBundle, type FhirOptions } from '../services/fhir';
import type { Resolver } from '../services/resolver';

export type DiseaseRouterDeps = {
  catalog: DiseaseCatalog;
  resolver: Resolver;
  fhir: FhirOptions;
};

// `?threshold=` means "use the configured default", not 0
const blankAsUnset = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);

const codeQuerySchema = z.object({
  disease: z.string().default(''),
  threshold: z.preprocess(blankAsUnset, z.coerce.number().optional()),
});

const codeValue = z.string().trim().min(1);

// Body keys name the coding systems rather than the entry fields.
const updateBodySchema = z
  .object({
    ICD11: codeValue.optional(),
    TM2: codeValue.optional(),
  })
  .strict();

export function createDiseaseRouter({ catalog, resolver, fhir }: DiseaseRouterDeps): Router {
  const r = Router();

  r.get('/', (_req, res) => {
    res.json(toBundle(catalog.entries(), fhir));
  });

  r.get('/code', (req, res, next) => {
    try {
      const { disease, threshold } = codeQuerySchema.parse(req.query);
      const result = resolver.resolve(disease, threshold);
      if (!result.success) return res.status(result.error.status).json(errorOutcome(result.error));

      const match = result.data;
      if (match.kind === 'not-found') {
        return res.status(404).json(outcome('error', 'not-found', 'Disease not found'));
      }
      res.json(matchToCondition(match, fhir));
    } catch (error) {
      next(error);
    }
  });

  r.put('/:name', (req, res, next) => {
    try {
      const body = updateBodySchema.parse(req.body ?? {});
      const { name } = req.params;
      const result = catalog.update(name, { primaryCode: body.ICD11, secondaryCode: body.TM2 });
      if (!result.success) {
        console.warn(`[diseases] update of "${name}" rejected: ${result.error.message}`);
        return res.status(result.error.status).json(errorOutcome(result.error));
      }
      console.info(`[diseases] updated "${name}"`, result.data);
      res.json(outcome('information', 'updated', `${name} updated successfully`));
    } catch (error) {
      next(error);
    }
  });

  r.delete('/:name', (req, res) => {
    const { name } = req.params;
    const result = catalog.delete(name);
    if (!result.success) {
      console.warn(`[diseases] delete skipped, "${name}" not in catalog`);
      return res.status(result.error.status).json(errorOutcome(result.error));
    }
    console.info(`[diseases] deleted "${result.data}"`);
    res.json(outcome('information', 'deleted', `${result.data} deleted successfully`));
  });

  return r;
}
