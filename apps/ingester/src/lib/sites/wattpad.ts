import type { SiteDefinition } from './types';

export const wattpadSite: SiteDefinition = {
  id: 'wattpad.com',
  hosts: ['wattpad.com'],
  storyPattern: /^\/story\/(\d+)/,
  canonicalUrl: (m) => `https://www.wattpad.com/story/${m[1]}`,
};
