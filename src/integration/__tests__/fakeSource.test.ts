import { describe, it, expect } from 'vitest';
import { FakeDataSource } from '../fakeSource';

const NOW = new Date(Date.UTC(2024, 2, 1, 12, 0, 0));
const EPOCH = new Date(0);

describe('FakeDataSource', () => {
  const source = new FakeDataSource(NOW);

  it('should hold one hundred positive and one hundred negative verbatims', () => {
    expect(source.size).toBe(200);
  });

  it('should return the first page by default', () => {
    const page = source.newerThan(EPOCH);

    expect(page).toHaveLength(40);
    expect(page[0]).toEqual({
      rawId: 'this is an id 0',
      text: 'Yay, I love this company 0!',
      nps: 0,
      timestamp: NOW,
      username: 'user0',
    });
  });

  it('should page through in stored order', () => {
    const page = source.newerThan(EPOCH, 40, 4);

    expect(page).toHaveLength(40);
    expect(page[0]?.rawId).toBe('this is an id 60');
    expect(page[0]?.text).toBe('Boo, I hate this company 60!');
    expect(page[0]?.nps).toBe(5);
  });

  it('should return a short last page and then nothing', () => {
    expect(source.newerThan(EPOCH, 30, 6)).toHaveLength(20);
    expect(source.newerThan(EPOCH, 40, 5)).toEqual([]);
  });

  it('should include verbatims stamped exactly at the limit', () => {
    expect(source.newerThan(NOW)).toHaveLength(40);
  });

  it('should exclude verbatims older than the limit', () => {
    expect(source.newerThan(new Date(NOW.getTime() + 1))).toEqual([]);
  });
});
