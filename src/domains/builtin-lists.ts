import type { Mode } from '../config/probe-config';

/** Sites commonly throttled or reset by DPI middleboxes. */
export const DPI_BLOCKED_SITES: readonly string[] = [
  'youtube.com',
  'discord.com',
  'instagram.com',
  'facebook.com',
  'x.com',
  'patreon.com',
  'linkedin.com',
  'rutracker.org',
  'nnmclub.to',
  'digitalocean.com',
  'medium.com',
  'ntc.party',
  'amnezia.org',
  'getoutline.org',
  'mailfence.com',
  'flibusta.is',
  'rezka.ag',
];

/** Sites that refuse clients by apparent country. */
export const GEO_BLOCKED_SITES: readonly string[] = [
  'spotify.com',
  'netflix.com',
  'swagger.io',
  'snyk.io',
  'mongodb.com',
  'autodesk.com',
  'graylog.org',
  'redis.io',
];

export function builtinDomains(mode: Mode): string[] {
  switch (mode) {
    case 'dpi':
      return [...DPI_BLOCKED_SITES];
    case 'geoblock':
      return [...GEO_BLOCKED_SITES];
    case 'both':
      return [...DPI_BLOCKED_SITES, ...GEO_BLOCKED_SITES];
  }
}
