import { expect, test } from '@playwright/test';
import type { RawRecord } from '../src/core/types';
import { Deduplicator, deduplicate, fingerprint, normalizeKeyPart } from '../src/pipeline/deduplicator';

const record = (title: string, url: string, extra: Partial<RawRecord> = {}): RawRecord => ({
  university: 'HK001',
  title,
  url,
  ...extra,
});

test.describe('Deduplicator', () => {
  test('normalises by trimming, collapsing whitespace and case-folding', () => {
    expect(normalizeKeyPart('  MSc   Data\tScience \n')).toBe('msc data science');
    expect(fingerprint(record(' MSc  Finance ', 'HTTPS://Uni.Example/P/1 '))).toBe(
      'msc finance|https://uni.example/p/1',
    );
  });

  test('accepts the first of two records that differ only in case and whitespace', () => {
    const gate = new Deduplicator();
    const first = record('MSc Finance', 'https://uni.example/p/1', { deadline: '1 March 2026' });

    expect(gate.offer(first)).toBe('accepted');
    expect(gate.offer(record('  msc   FINANCE ', 'https://uni.example/p/1'))).toBe('duplicate');

    expect(gate.accepted()).toEqual([first]);
    expect(gate.duplicates).toBe(1);
  });

  test('same title at a different URL is a different program', () => {
    const gate = new Deduplicator();
    gate.offer(record('MSc Finance', 'https://uni.example/p/1'));

    expect(gate.offer(record('MSc Finance', 'https://uni.example/p/2'))).toBe('accepted');
    expect(gate.size).toBe(2);
  });

  test('keeps acceptance order', () => {
    const accepted = deduplicate([
      record('B', 'https://u/b'),
      record('A', 'https://u/a'),
      record('b', 'https://u/b'),
      record('C', 'https://u/c'),
    ]);
    expect(accepted.map((r) => r.title)).toEqual(['B', 'A', 'C']);
  });

  test('is idempotent over its own output', () => {
    const once = deduplicate([record('A', 'https://u/a'), record('a ', 'https://u/a')]);
    expect(deduplicate(once)).toEqual(once);
  });

  test('interleaved offers from concurrent producers accept exactly one per identity', async () => {
    const gate = new Deduplicator();
    const producer = async (variant: string) => {
      for (let i = 0; i < 20; i++) {
        await new Promise((resolve) => setTimeout(resolve, Math.floor(Math.random() * 3)));
        gate.offer(record(`${variant}Program ${i % 5}`, `https://u/p/${i % 5}`));
      }
    };

    await Promise.all([producer(''), producer('  '), producer('\t')]);

    expect(gate.size).toBe(5);
    expect(gate.duplicates).toBe(55);
  });

  test('refuses input after close', () => {
    const gate = new Deduplicator();
    gate.close();
    expect(() => gate.offer(record('A', 'https://u/a'))).toThrow('closed');
  });
});
