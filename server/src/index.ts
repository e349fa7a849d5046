import { createApp } from './app';
import { loadSeedCatalog } from './db/seed';
import { env } from './env';
import { Resolver } from './services/resolver';
import { getScorer } from './services/scoring';

const catalog = loadSeedCatalog();
const resolver = new Resolver(catalog, {
  scorer: getScorer(env.MATCH_SCORER),
  threshold: env.MATCH_THRESHOLD,
});

const app = createApp({
  catalog,
  resolver,
  fhir: {
    patientReference: env.PATIENT_REFERENCE,
    primarySystem: env.ICD11_SYSTEM,
    secondarySystem: env.TM2_SYSTEM,
  },
});

app.listen(env.PORT, () => {
  console.info(`[server] listening on ${env.PORT} (scorer=${env.MATCH_SCORER}, threshold=${env.MATCH_THRESHOLD})`);
});
