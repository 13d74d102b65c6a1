import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect } from 'vitest';
import { buildOddsSnapshot, writeOddsSnapshot } from '../../src/snapshots/odds-snapshot.js';
import { buildReferenceDirectories } from '../../src/pipeline/reference-store.js';
import { normalizeEvents } from '../../src/pipeline/event-normalizer.js';
import { FIXTURE_NOW, loadFeedFixture } from '../helpers/fixture-loader.js';

describe('odds snapshot', () => {
  const feed = loadFeedFixture();
  const directories = buildReferenceDirectories(feed);
  const events = normalizeEvents(feed, 6, { now: FIXTURE_NOW, timeZone: 'America/New_York' });
  const generatedAt = new Date('2026-10-19T16:00:00Z');

  it('should key events by league and team ids', () => {
    const snapshot = buildOddsSnapshot({ nhl: events }, directories, generatedAt);

    expect(Object.keys(snapshot)).toEqual(['nhl']);
    expect(Object.keys(snapshot.nhl ?? {})).toEqual(['101', '102', '105']);
    expect(snapshot.nhl?.['105']).toEqual({
      start_time: '2026-10-19T23:30:00',
      name: 'New York Rangers @ New Jersey Devils',
      timestamp: '2026-10-19T16:00:00.000Z',
      '17': { '2': { odds: 110, timestamp: '2026-10-19T13:00:00', market_name: 'Circa', line: null } },
      '18': { '2': { odds: -130, timestamp: '2026-10-19T13:00:00', market_name: 'Circa', line: null } },
    });
  });

  it('should use the placeholder name for unknown books', () => {
    const snapshot = buildOddsSnapshot({ nhl: events }, directories, generatedAt);
    const side = snapshot.nhl?.['101']?.['11'];
    expect(typeof side === 'object' ? side['5']?.market_name : undefined).toBe('Book 5');
  });

  it('should write indented JSON, creating the directory', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'underdog-ev-snap-'));
    try {
      const file = path.join(dir, 'nested', 'odds.json');
      const snapshot = buildOddsSnapshot({ nhl: events }, directories, generatedAt);
      writeOddsSnapshot(file, snapshot);

      const text = fs.readFileSync(file, 'utf-8');
      expect(text.startsWith('{\n  "nhl": {')).toBe(true);
      expect(JSON.parse(text)).toEqual(snapshot);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
