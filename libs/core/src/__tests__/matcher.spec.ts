/**
 * Fuzzy matcher tests
 */

import { createEntry } from '../entries';
import { NEUTRAL_SCORE, rankEntries, score, searchableFields } from '../matcher';

const NOW = new Date('2026-01-01T00:00:00.000Z');

describe('score', () => {
  it('gives the neutral score to an empty query', () => {
    expect(score('', ['anything'])).toBe(NEUTRAL_SCORE);
  });

  it('matches whitespace in the query literally', () => {
    // 1000 base + round(1/10 * 250) + 50 alias
    expect(score(' ', ['git status'])).toBe(1075);
    expect(score('   ', ['anything'])).toBeNull();
    expect(score('git ', ['git'])).toBeNull();
  });

  it('scores a prefix substring hit on the alias', () => {
    // 1000 base + 500 prefix + round(3/6 * 250) + 50 alias
    expect(score('dep', ['deploy'])).toBe(1675);
  });

  it('is case-insensitive', () => {
    expect(score('DEP', ['Deploy'])).toBe(score('dep', ['deploy']));
  });

  it('falls back to a subsequence match penalised by gaps', () => {
    // d . p . . y : three skipped characters after the first hit
    expect(score('dpy', ['deploy'])).toBe(300 - 3 * 5 + 50);
  });

  it('returns null when no field matches', () => {
    expect(score('xyz', ['deploy', 'ship it', 'git push'])).toBeNull();
  });

  it('takes the best field', () => {
    const viaCommand = score('push', ['release', '', 'git push']);
    // non-prefix substring in an 8 char field: 1000 + round(4/8 * 250)
    expect(viaCommand).toBe(1125);
  });

  it('ranks a substring hit above any subsequence hit', () => {
    const substring = score('log', ['x', 'catalog']);
    const subsequence = score('log', ['lxoxg']);
    expect(substring).not.toBeNull();
    expect(subsequence).not.toBeNull();
    expect(substring as number).toBeGreaterThan(subsequence as number);
  });

  it('prefers shorter fields for the same substring', () => {
    const short = score('api', ['x', 'api-dev']);
    const long = score('api', ['x', 'api-development-server']);
    expect(short as number).toBeGreaterThan(long as number);
  });
});

describe('rankEntries', () => {
  const build = createEntry('link', { alias: 'build', command: 'npm run build' }, NOW);
  const deploy = createEntry('chain', { alias: 'deploy', command: 'git pull && npm run deploy', tags: ['release'] }, NOW);
  const docker = createEntry('link', { alias: 'docker-build', command: 'docker compose build' }, NOW);

  it('orders by alias for the empty query', () => {
    const ranked = rankEntries([docker, deploy, build], '');
    expect(ranked.map((r) => r.entry.alias)).toEqual(['build', 'deploy', 'docker-build']);
  });

  it('includes every entry with a substring hit in any field', () => {
    const ranked = rankEntries([build, deploy, docker], 'release');
    expect(ranked.map((r) => r.entry.alias)).toEqual(['deploy']);
  });

  it('keeps subsequence-only matches', () => {
    const ranked = rankEntries([build, deploy, docker], 'dkb');
    expect(ranked.map((r) => r.entry.alias)).toEqual(['docker-build']);
  });

  it('sorts by descending score', () => {
    const ranked = rankEntries([docker, build], 'build');
    expect(ranked.map((r) => r.entry.alias)).toEqual(['build', 'docker-build']);
    expect(ranked[0].score).toBeGreaterThan(ranked[1].score);
  });

  it('searches alias, description, tags and command in that order', () => {
    const entry = createEntry('link', { alias: 'a', command: 'cmd', description: 'desc', tags: ['t2', 't1'] }, NOW);
    expect(searchableFields(entry)).toEqual(['a', 'desc', 't1', 't2', 'cmd']);
  });
});
