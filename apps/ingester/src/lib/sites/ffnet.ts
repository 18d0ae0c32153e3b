import type { SiteDefinition } from './types';

export const ffnetSite: SiteDefinition = {
  id: 'fanfiction.net',
  hosts: ['fanfiction.net'],
  storyPattern: /^\/s\/(\d+)/,
  canonicalUrl: (m) => `https://www.fanfiction.net/s/${m[1]}/1/`,
};

export const fictionpressSite: SiteDefinition = {
  id: 'fictionpress.com',
  hosts: ['fictionpress.com'],
  storyPattern: /^\/s\/(\d+)/,
  canonicalUrl: (m) => `https://www.fictionpress.com/s/${m[1]}/1/`,
};
