import { aggregatePlayerStats, averageScore, emptyDistribution, sortPlayerStats } from '../src/lib/stats';

describe('aggregatePlayerStats', () => {
  test('no records means no players', () => {
    expect(aggregatePlayerStats([])).toEqual({});
  });

  test('counts one player across three games', () => {
    const records = ['3', '4', 'X'].map((score) => ({
      startingWord: 'CRANE',
      playerScores: [{ id: 'u1', name: 'Ryan', score }],
    }));
    const stats = aggregatePlayerStats(records);
    expect(stats).toEqual({
      u1: {
        name: 'Ryan',
        totalGames: 3,
        distribution: { ...emptyDistribution(), '3': 1, '4': 1, X: 1 },
      },
    });
  });

  test('the last name seen wins', () => {
    const stats = aggregatePlayerStats([
      { startingWord: 'CRANE', playerScores: [{ id: 'u1', name: 'Ryan', score: '2' }] },
      { startingWord: 'SLATE', playerScores: [{ id: 'u1', name: 'Ry', score: '5' }] },
    ]);
    expect(stats.u1.name).toBe('Ry');
    expect(stats.u1.totalGames).toBe(2);
  });

  test('skips malformed records and entries without failing', () => {
    const stats = aggregatePlayerStats([
      null,
      'junk',
      { startingWord: 'CRANE' },
      { startingWord: 'CRANE', playerScores: 'none' },
      {
        startingWord: 'CRANE',
        playerScores: [{ id: 'u1', name: 'Ryan' }, { id: 'u2', name: 'Mandy', score: '4' }, 7],
      },
    ]);
    expect(Object.keys(stats)).toEqual(['u2']);
    expect(stats.u2.distribution['4']).toBe(1);
  });

  test('unknown score values go to the other bucket', () => {
    const stats = aggregatePlayerStats([
      { playerScores: [{ id: 'u1', name: 'Ryan', score: '7' }] },
      { playerScores: [{ id: 'u1', name: 'Ryan', score: 'x' }] },
    ]);
    expect(stats.u1.totalGames).toBe(2);
    expect(stats.u1.distribution.other).toBe(2);
    expect(stats.u1.distribution.X).toBe(0);
  });

  test('player ids that name Object built-ins are counted like any other', () => {
    const stats = aggregatePlayerStats([
      {
        playerScores: [
          { id: 'constructor', name: 'Cora', score: '3' },
          { id: '__proto__', name: 'Pip', score: '4' },
          { id: 'toString', name: 'Tess', score: 'X' },
        ],
      },
      { playerScores: [{ id: 'constructor', name: 'Cora', score: '5' }] },
    ]);
    expect(Object.keys(stats).sort()).toEqual(['__proto__', 'constructor', 'toString']);
    expect(Object.getPrototypeOf(stats)).toBe(Object.prototype);

    const rows = sortPlayerStats(stats);
    expect(rows.map((r) => [r.id, r.name, r.totalGames, r.average])).toEqual([
      ['constructor', 'Cora', 2, 4],
      ['__proto__', 'Pip', 1, 4],
      ['toString', 'Tess', 1, null],
    ]);
    expect(rows[0].distribution).toEqual({ ...emptyDistribution(), '3': 1, '5': 1 });
  });
});

describe('averageScore', () => {
  test('averages solved games only', () => {
    const dist = { ...emptyDistribution(), '3': 2, '4': 1, X: 3, other: 1 };
    expect(averageScore({ name: 'Ryan', totalGames: 7, distribution: dist })).toBe(3.33);
  });

  test('is null with nothing solved', () => {
    const dist = { ...emptyDistribution(), X: 2 };
    expect(averageScore({ name: 'Ryan', totalGames: 2, distribution: dist })).toBeNull();
  });
});

describe('sortPlayerStats', () => {
  test('orders by name, then id', () => {
    const rows = sortPlayerStats(
      aggregatePlayerStats([
        {
          playerScores: [
            { id: 'u3', name: 'Mandy', score: '2' },
            { id: 'u2', name: 'Link', score: '6' },
            { id: 'u1', name: 'Mandy', score: '4' },
          ],
        },
      ]),
    );
    expect(rows.map((r) => r.id)).toEqual(['u2', 'u1', 'u3']);
    expect(rows[0]).toEqual({
      id: 'u2',
      name: 'Link',
      totalGames: 1,
      distribution: { ...emptyDistribution(), '6': 1 },
      average: 6,
    });
  });
});
