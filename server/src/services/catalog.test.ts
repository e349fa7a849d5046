import { describe, it, expect, beforeEach } from 'vitest';
import { DiseaseCatalog } from './catalog';
import { InvalidQueryError, NotFoundError } from './errors';

const seed = {
  Asthma: { primaryCode: 'CA23', secondaryCode: 'TM2-404' },
  'Diabetes mellitus': { primaryCode: '5A11', secondaryCode: 'TM2-101' },
  Fever: { primaryCode: 'MG21', secondaryCode: 'TM2-210' },
};

describe('DiseaseCatalog', () => {
  let catalog: DiseaseCatalog;

  beforeEach(() => {
    catalog = new DiseaseCatalog(seed);
  });

  it('looks up entries by exact, case-sensitive name', () => {
    expect(catalog.get('Asthma')).toEqual({ primaryCode: 'CA23', secondaryCode: 'TM2-404' });
    expect(catalog.get('asthma')).toBeUndefined();
    expect(catalog.get('')).toBeUndefined();
  });

  it('does not trim lookup keys', () => {
    expect(catalog.get(' Asthma ')).toBeUndefined();
    expect(catalog.get(' Asthma')).toBeUndefined();
  });

  it('rejects seed names that collide after trimming', () => {
    expect(
      () =>
        new DiseaseCatalog({
          Asthma: { primaryCode: 'CA23', secondaryCode: 'TM2-404' },
          'Asthma ': { primaryCode: 'X1', secondaryCode: 'X2' },
        }),
    ).toThrow('duplicate disease name in seed: "Asthma"');
  });

  it('lists names in insertion order', () => {
    expect(catalog.names()).toEqual(['Asthma', 'Diabetes mellitus', 'Fever']);
    expect(catalog.size).toBe(3);
  });

  it('returns name snapshots that later mutations do not touch', () => {
    const snapshot = catalog.names();
    catalog.delete('Fever');
    expect(snapshot).toEqual(['Asthma', 'Diabetes mellitus', 'Fever']);
    expect(catalog.names()).toEqual(['Asthma', 'Diabetes mellitus']);
  });

  it('accepts a Map seed', () => {
    const fromMap = new DiseaseCatalog(new Map([['Fever', { primaryCode: 'MG21', secondaryCode: 'TM2-210' }]]));
    expect(fromMap.entries()).toEqual([['Fever', { primaryCode: 'MG21', secondaryCode: 'TM2-210' }]]);
  });

  it('rejects blank names and empty codes in the seed', () => {
    expect(() => new DiseaseCatalog({ '  ': { primaryCode: 'CA23', secondaryCode: 'TM2-404' } })).toThrow();
    expect(() => new DiseaseCatalog({ Asthma: { primaryCode: '', secondaryCode: 'TM2-404' } })).toThrow();
  });

  describe('update', () => {
    it('overwrites only the supplied fields', () => {
      const result = catalog.update('Asthma', { primaryCode: 'X1' });
      expect(result).toEqual({ success: true, data: { primaryCode: 'X1', secondaryCode: 'TM2-404' } });
      expect(catalog.get('Asthma')).toEqual({ primaryCode: 'X1', secondaryCode: 'TM2-404' });
    });

    it('treats undefined fields as omitted', () => {
      catalog.update('Fever', { primaryCode: undefined, secondaryCode: 'TM2-999' });
      expect(catalog.get('Fever')).toEqual({ primaryCode: 'MG21', secondaryCode: 'TM2-999' });
    });

    it('replaces the entry instead of mutating it', () => {
      const before = catalog.get('Asthma');
      catalog.update('Asthma', { primaryCode: 'X1', secondaryCode: 'X2' });
      expect(before).toEqual({ primaryCode: 'CA23', secondaryCode: 'TM2-404' });
      expect(Object.isFrozen(catalog.get('Asthma'))).toBe(true);
    });

    it('leaves other entries alone', () => {
      catalog.update('Asthma', { primaryCode: 'X1' });
      catalog.update('Fever', { secondaryCode: 'TM2-999' });
      expect(catalog.get('Asthma')).toEqual({ primaryCode: 'X1', secondaryCode: 'TM2-404' });
      expect(catalog.get('Fever')).toEqual({ primaryCode: 'MG21', secondaryCode: 'TM2-999' });
      expect(catalog.get('Diabetes mellitus')).toEqual({ primaryCode: '5A11', secondaryCode: 'TM2-101' });
    });

    it('fails with NotFoundError for an unknown name and changes nothing', () => {
      const before = catalog.entries();
      const result = catalog.update('Cholera', { primaryCode: 'X1' });
      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(NotFoundError);
      expect(result.error.status).toBe(404);
      if (result.error instanceof NotFoundError) expect(result.error.diseaseName).toBe('Cholera');
      expect(catalog.entries()).toEqual(before);
    });

    it('misses a name that only matches after trimming', () => {
      const result = catalog.update(' Asthma', { primaryCode: 'X1' });
      expect(result.success).toBe(false);
      expect(catalog.get('Asthma')).toEqual({ primaryCode: 'CA23', secondaryCode: 'TM2-404' });
    });

    it('rejects an empty code without touching the entry', () => {
      const result = catalog.update('Asthma', { secondaryCode: '  ' });
      expect(result.success).toBe(false);
      if (!result.success) expect(result.error).toBeInstanceOf(InvalidQueryError);
      expect(catalog.get('Asthma')).toEqual({ primaryCode: 'CA23', secondaryCode: 'TM2-404' });
    });
  });

  describe('delete', () => {
    it('removes the entry and confirms with its name', () => {
      expect(catalog.delete('Fever')).toEqual({ success: true, data: 'Fever' });
      expect(catalog.get('Fever')).toBeUndefined();
    });

    it('misses a name that only matches after trimming', () => {
      const result = catalog.delete(' Fever');
      expect(result.success).toBe(false);
      if (!result.success) expect(result.error).toBeInstanceOf(NotFoundError);
      expect(catalog.names()).toEqual(['Asthma', 'Diabetes mellitus', 'Fever']);
    });

    it('fails the second time and keeps the state stable', () => {
      catalog.delete('Fever');
      const second = catalog.delete('Fever');
      expect(second.success).toBe(false);
      if (!second.success) expect(second.error).toBeInstanceOf(NotFoundError);
      expect(catalog.get('Fever')).toBeUndefined();
      expect(catalog.get('Fever')).toBeUndefined();
      expect(catalog.names()).toEqual(['Asthma', 'Diabetes mellitus']);
    });
  });
});
