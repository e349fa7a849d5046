import type { CodeEntry } from './catalog';
import type { CodingError, IssueCode } from './errors';
import type { MatchResult } from './resolver';

export type Coding = {
  system: string;
  code: string;
  display: string;
};

export type Condition = {
  resourceType: 'Condition';
  id: string;
  code: { coding: Coding[] };
  subject: { reference: string };
  note?: { text: string }[];
  extension?: { url: string; valueDecimal: number }[];
};

export type Bundle = {
  resourceType: 'Bundle';
  type: 'collection';
  total: number;
  entry: { resource: Condition }[];
};

export type IssueSeverity = 'information' | 'error';

export type OperationOutcome = {
  resourceType: 'OperationOutcome';
  issue: {
    severity: IssueSeverity;
    code: IssueCode | 'updated' | 'deleted';
    details: { text: string };
  }[];
};

export type FhirOptions = {
  patientReference: string;
  primarySystem: string;
  secondarySystem: string;
};

export const MATCH_SCORE_EXTENSION = 'http://example.org/fhir/StructureDefinition/match-score';

export function conditionId(name: string): string {
  const slug = name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return `cond-${slug || 'unnamed'}`.slice(0, 64);
}

export function toCondition(name: string, entry: CodeEntry, options: FhirOptions): Condition {
  return {
    resourceType: 'Condition',
    id: conditionId(name),
    code: {
      coding: [
        { system: options.primarySystem, code: entry.primaryCode, display: name },
        { system: options.secondarySystem, code: entry.secondaryCode, display: `${name} (TM2)` },
      ],
    },
    subject: { reference: options.patientReference },
  };
}

/** Only called for successful matches; `not-found` is reported as an OperationOutcome. */
export function matchToCondition(match: Exclude<MatchResult, { kind: 'not-found' }>, options: FhirOptions): Condition {
  const condition = toCondition(match.name, match.entry, options);
  if (match.kind === 'exact') return condition;
  return {
    ...condition,
    note: [{ text: `Did you mean '${match.name}'?` }],
    extension: [{ url: MATCH_SCORE_EXTENSION, valueDecimal: Math.round(match.score * 100) / 100 }],
  };
}

export function toBundle(entries: [string, CodeEntry][], options: FhirOptions): Bundle {
  return {
    resourceType: 'Bundle',
    type: 'collection',
    total: entries.length,
    entry: entries.map(([name, entry]) => ({ resource: toCondition(name, entry, options) })),
  };
}

export function outcome(severity: IssueSeverity, code: OperationOutcome['issue'][number]['code'], text: string): OperationOutcome {
  return {
    resourceType: 'OperationOutcome',
    issue: [{ severity, code, details: { text } }],
  };
}

export function errorOutcome(error: CodingError): OperationOutcome {
  return outcome('error', error.issueCode, error.message);
}
