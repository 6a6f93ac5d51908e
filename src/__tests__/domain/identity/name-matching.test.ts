import {
  IdentityCandidate,
  normalizeName,
  resolveIdentity,
} from '../../../domain/identity/name-matching';

const players: IdentityCandidate[] = [
  { canonical: 'Patrick Mahomes' },
  { canonical: 'Josh Allen' },
  { canonical: 'Travis Kelce' },
  { canonical: 'Allen Robinson' },
];

describe('name matching', () => {
  describe('normalizeName', () => {
    it('lowercases, strips punctuation and suffixes', () => {
      expect(normalizeName("Odell Beckham Jr.")).toBe('odell beckham');
      expect(normalizeName('  Ja\'Marr   Chase ')).toBe('jamarr chase');
      expect(normalizeName('Marvin Harrison II')).toBe('marvin harrison');
    });

    it('folds accented letters', () => {
      expect(normalizeName('José Abreu')).toBe('jose abreu');
      expect(normalizeName('Zoë Ångström')).toBe('zoe angstrom');
    });

    it('keeps a lone token that looks like a suffix', () => {
      expect(normalizeName('V')).toBe('v');
    });
  });

  describe('resolveIdentity', () => {
    it('returns exactly one identity at 1.0 for an exact name', () => {
      expect(resolveIdentity('Patrick Mahomes', players)).toEqual([
        { canonical: 'Patrick Mahomes', score: 1 },
      ]);
    });

    it('resolves a misspelled surname above the threshold', () => {
      const matches = resolveIdentity('Mahomess', players);

      expect(matches).toHaveLength(1);
      expect(matches[0].canonical).toBe('Patrick Mahomes');
      expect(matches[0].score).toBeGreaterThanOrEqual(0.6);
      expect(matches[0].score).toBeLessThan(1);
    });

    it('returns nothing for an unknown name', () => {
      expect(resolveIdentity('Zzyzx Nobody', players)).toEqual([]);
    });

    it('keeps near matches below 1 and orders equal scores by name', () => {
      expect(resolveIdentity('Allen', players)).toEqual([
        { canonical: 'Allen Robinson', score: 0.999 },
        { canonical: 'Josh Allen', score: 0.999 },
      ]);
    });

    it('treats an unaccented query as an exact match', () => {
      const accented: IdentityCandidate[] = [{ canonical: 'José Abreu' }, { canonical: 'Jose Abreus' }];

      expect(resolveIdentity('Jose Abreu', accented)).toEqual([{ canonical: 'José Abreu', score: 1 }]);
    });

    it('returns nothing for a query that is only punctuation', () => {
      expect(resolveIdentity('...', players)).toEqual([]);
    });

    it('matches a candidate through its aliases', () => {
      const teams: IdentityCandidate[] = [
        { canonical: 'KC', aliases: ['Kansas City Chiefs', 'Chiefs'] },
        { canonical: 'BUF', aliases: ['Buffalo Bills', 'Bills'] },
      ];

      expect(resolveIdentity('chiefs', teams)).toEqual([{ canonical: 'KC', score: 1 }]);
      expect(resolveIdentity('Bils', teams).map((m) => m.canonical)).toEqual(['BUF']);
    });
  });
});
