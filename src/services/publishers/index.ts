import type { AxiosInstance } from 'axios';
import type { PublishingCredentials } from '../../config/env';
import { ConfigurationError } from '../../utils/errors';
import { AyrsharePublisher } from './ayrshare';
import { LinkedInPublisher } from './linkedin';
import type { PublishMethod, Publisher, PublishResult } from './types';
import { WebhookPublisher } from './webhook';

export { PUBLISH_METHODS } from './types';
export type { PublishMethod, Publisher, PublisherProfile, PublishResult } from './types';
export { AyrsharePublisher, LinkedInPublisher, WebhookPublisher };

const NO_CREDENTIALS = `No posting credentials found. Set one of:
  FREE OPTIONS:
  - ZAPIER_WEBHOOK_URL (100 tasks/month free)
  - MAKE_WEBHOOK_URL (1000 ops/month free)
  - LINKEDIN_ACCESS_TOKEN (free but complex)
  PAID:
  - AYRSHARE_API_KEY ($49/mo+)`;

/**
 * Pick a publishing backend. With `auto`, the first configured one wins, free
 * options first.
 */
export function createPublisher(
  method: PublishMethod | 'auto',
  credentials: PublishingCredentials,
  client?: AxiosInstance
): Publisher {
  if (method === 'auto') {
    if (credentials.zapierWebhookUrl) return createPublisher('zapier', credentials, client);
    if (credentials.makeWebhookUrl) return createPublisher('make', credentials, client);
    if (credentials.linkedinAccessToken) return createPublisher('linkedin', credentials, client);
    if (credentials.ayrshareApiKey) return createPublisher('ayrshare', credentials, client);
    throw new ConfigurationError(NO_CREDENTIALS);
  }

  switch (method) {
    case 'zapier':
      return new WebhookPublisher('zapier', credentials.zapierWebhookUrl, client);
    case 'make':
      return new WebhookPublisher('make', credentials.makeWebhookUrl, client);
    case 'linkedin':
      return new LinkedInPublisher(credentials.linkedinAccessToken, credentials.linkedinPersonId, client);
    case 'ayrshare':
      return new AyrsharePublisher(credentials.ayrshareApiKey, client);
  }
}

/**
 * Post now, or schedule when a time is given. A backend that cannot schedule
 * raises; the post is never sent immediately in its place. `profileId` picks
 * one of the backend's profiles where it has several.
 */
export function publish(
  publisher: Publisher,
  text: string,
  scheduleAt?: Date,
  profileId?: string
): Promise<PublishResult> {
  return scheduleAt ? publisher.schedulePost(text, scheduleAt, profileId) : publisher.postNow(text, profileId);
}
