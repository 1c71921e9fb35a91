import { describe, expect, it } from 'vitest';
import { articleIdFor, randomId, uuidV5 } from '../crypto';

describe('uuidV5', () => {
  it('matches a known DNS namespace vector', () => {
    expect(uuidV5('www.example.com')).toBe('2ed6657d-e927-568b-95e1-2665a8aea6a2');
  });

  it('is deterministic and sensitive to the name', () => {
    expect(articleIdFor('Title', 'Source')).toBe(articleIdFor('Title', 'Source'));
    expect(articleIdFor('Title', 'Source')).not.toBe(articleIdFor('Title', 'Other Source'));
  });

  it('keeps title and source apart when either contains the joining character', () => {
    expect(articleIdFor('a-b', 'c')).not.toBe(articleIdFor('a', 'b-c'));
  });
});

describe('randomId', () => {
  it('produces distinct v4 ids', () => {
    const a = randomId();
    expect(a).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(randomId()).not.toBe(a);
  });
});
