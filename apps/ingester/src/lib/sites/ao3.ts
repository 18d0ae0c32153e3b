import type { SiteDefinition } from './types';

export const ao3Site: SiteDefinition = {
  id: 'archiveofourown.org',
  hosts: ['archiveofourown.org', 'ao3.org'],
  storyPattern: /^\/(?:collections\/[^/]+\/)?works\/(\d+)/,
  canonicalUrl: (m) => `https://archiveofourown.org/works/${m[1]}`,
};
