import { describe, it, expect } from 'vitest';
import { formatPublishDate } from '@/utils/date';
import { gravatarUrl } from '@/utils/gravatar';

describe('formatPublishDate', () => {
  it('writes the long month, a two-digit day and the year', () => {
    expect(formatPublishDate(new Date(2024, 3, 5, 12))).toBe('April 05, 2024');
    expect(formatPublishDate(new Date(2023, 11, 31, 12))).toBe('December 31, 2023');
  });
});

describe('gravatarUrl', () => {
  it('hashes the trimmed, lower-cased email with retro fallback by default', () => {
    expect(gravatarUrl('  ')).toBe(
      'https://www.gravatar.com/avatar/d41d8cd98f00b204e9800998ecf8427e?s=100&d=retro&r=g'
    );
  });

  it('ignores case and surrounding whitespace', () => {
    expect(gravatarUrl(' A@X.com ')).toBe(gravatarUrl('a@x.com'));
  });

  it('takes size, rating and fallback options', () => {
    expect(gravatarUrl('', { size: 50, rating: 'pg', fallback: 'identicon' })).toBe(
      'https://www.gravatar.com/avatar/d41d8cd98f00b204e9800998ecf8427e?s=50&d=identicon&r=pg'
    );
  });
});
