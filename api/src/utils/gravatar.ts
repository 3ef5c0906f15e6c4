/**
 * Gravatar URLs for comment authors
 */

import crypto from 'crypto';

export interface GravatarOptions {
  size?: number;
  rating?: 'g' | 'pg' | 'r' | 'x';
  fallback?: 'retro' | 'identicon' | 'mp' | 'monsterid' | 'wavatar' | 'robohash' | 'blank';
}

export function gravatarUrl(email: string, options: GravatarOptions = {}): string {
  const hash = crypto.createHash('md5').update(email.trim().toLowerCase()).digest('hex');
  const params = new URLSearchParams({
    s: String(options.size ?? 100),
    d: options.fallback ?? 'retro',
    r: options.rating ?? 'g',
  });
  return `https://www.gravatar.com/avatar/${hash}?${params.toString()}`;
}
