import { beforeEach, describe, expect, test } from 'vitest';
import { parseDirection, resolveDirection, type Direction } from '../stack/navigation.js';
import { createTestContext, type TestContext } from './support/engine.js';
import { FakeRepo } from './support/fake-repo.js';

const LAYOUT = 'develop\n  a\n    b\n    c\nother\n';

describe('parseDirection', () => {
  test('accepts names and one-letter aliases', () => {
    expect(parseDirection('u')).toBe('up');
    expect(parseDirection('prev')).toBe('prev');
    expect(parseDirection('sideways')).toBeNull();
  });
});

describe('resolveDirection', () => {
  let repo: FakeRepo;
  let test_: TestContext;

  beforeEach(() => {
    repo = new FakeRepo();
    repo.branch('develop');
    repo.commit('develop', 'd2');
    test_ = createTestContext(repo, LAYOUT, { picks: ['c'] });
  });

  const resolve = async (direction: Direction, branch: string, pick = false): Promise<string[] | string> =>
    (await resolveDirection(test_.ctx, direction, branch, { pick })).match(
      (branches) => branches,
      (error) => error.message
    );

  test.each<[Direction, string, string[]]>([
    ['up', 'b', ['a']],
    ['down', 'a', ['b', 'c']],
    ['first', 'c', ['a']],
    ['last', 'b', ['c']],
    ['next', 'b', ['c']],
    ['prev', 'a', ['develop']],
    ['root', 'c', ['develop']],
    ['current', 'b', ['b']],
  ])('%s from %s', async (direction, branch, expected) => {
    expect(await resolve(direction, branch)).toEqual(expected);
  });

  test('down asks which child when picking', async () => {
    expect(await resolve('down', 'a', true)).toEqual(['c']);
    expect(test_.prompter.picks).toEqual(['downstream branch']);
  });

  test('reports the ends of the tree', async () => {
    expect(await resolve('up', 'develop')).toBe('Branch develop has no upstream branch');
    expect(await resolve('down', 'b')).toBe('Branch b has no downstream branch');
    expect(await resolve('next', 'other')).toBe('Branch other has no successor');
    expect(await resolve('prev', 'develop')).toBe('Branch develop has no predecessor');
  });

  test('falls back to a root for unmanaged branches', async () => {
    expect(await resolve('root', 'stray')).toEqual(['develop']);
    expect(await resolve('last', 'stray')).toEqual(['other']);
    expect(test_.reporter.warnings).toEqual([
      'stray is not a managed branch, assuming develop (the first root) instead as root',
      'stray is not a managed branch, assuming other (the last root) instead as root',
    ]);
  });

  test('up from an unmanaged branch uses the inferred parent', async () => {
    repo.branch('topic', 'develop');
    repo.commit('topic', 't1');

    expect(await resolve('up', 'topic')).toEqual(['develop']);
    expect(test_.reporter.warnings).toEqual([
      'topic is not a managed branch, assuming the inferred upstream develop',
    ]);
  });
});
