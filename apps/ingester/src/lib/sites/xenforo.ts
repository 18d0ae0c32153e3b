import type { SiteDefinition } from './types';

// XenForo boards share the /threads/<slug>.<id>/ layout
function xenforoSite(id: string, forumHost: string): SiteDefinition {
  return {
    id,
    hosts: [forumHost, id],
    storyPattern: /^\/threads\/([^/]+)/,
    canonicalUrl: (m) => `https://${forumHost}/threads/${m[1]}/`,
  };
}

export const spacebattlesSite = xenforoSite('spacebattles.com', 'forums.spacebattles.com');

export const sufficientVelocitySite = xenforoSite(
  'sufficientvelocity.com',
  'forums.sufficientvelocity.com'
);

export const questionableQuestingSite = xenforoSite(
  'questionablequesting.com',
  'forum.questionablequesting.com'
);
