import { ao3Site } from './ao3';
import { ffnetSite, fictionpressSite } from './ffnet';
import { royalroadSite } from './royalroad';
import { questionableQuestingSite, spacebattlesSite, sufficientVelocitySite } from './xenforo';
import { wattpadSite } from './wattpad';
import type { SiteDefinition } from './types';

export const KNOWN_SITES: readonly SiteDefinition[] = [
  ao3Site,
  ffnetSite,
  fictionpressSite,
  royalroadSite,
  spacebattlesSite,
  sufficientVelocitySite,
  questionableQuestingSite,
  wattpadSite,
];
