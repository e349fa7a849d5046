import dotenv from 'dotenv';
import { z } from 'zod';
import { SCORER_NAMES } from './services/scoring';

dotenv.config();

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  MATCH_THRESHOLD: z.coerce.number().min(0).max(100).default(70),
  MATCH_SCORER: z.enum(SCORER_NAMES).default('token-set'),
  PATIENT_REFERENCE: z.string().min(1).default('Patient/P12345'),
  ICD11_SYSTEM: z.string().url().default('http://id.who.int/icd/release/11'),
  TM2_SYSTEM: z.string().url().default('http://example.org/tm2'),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: Record<string, string | undefined>): Env {
  const blankAsUnset = Object.fromEntries(Object.entries(source).filter(([, value]) => value !== ''));
  return envSchema.parse(blankAsUnset);
}

export const env = parseEnv(process.env);
