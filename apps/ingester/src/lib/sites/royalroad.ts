import type { SiteDefinition } from './types';

export const royalroadSite: SiteDefinition = {
  id: 'royalroad.com',
  hosts: ['royalroad.com', 'royalroadl.com'],
  storyPattern: /^\/fiction\/(\d+)/,
  canonicalUrl: (m) => `https://www.royalroad.com/fiction/${m[1]}`,
};
