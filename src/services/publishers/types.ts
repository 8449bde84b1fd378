export const PUBLISH_METHODS = ['zapier', 'make', 'linkedin', 'ayrshare'] as const;

export type PublishMethod = (typeof PUBLISH_METHODS)[number];

export type PublishResult = Record<string, unknown>;

export interface PublisherProfile {
  service: string;
  username: string;
  id: string;
}

/**
 * What every publishing backend offers. Backends that lack a capability throw
 * UnsupportedOperationError instead of doing something else.
 */
export interface Publisher {
  readonly name: PublishMethod;
  postNow(text: string, profileId?: string): Promise<PublishResult>;
  schedulePost(text: string, scheduledAt: Date, profileId?: string): Promise<PublishResult>;
  getProfiles(): Promise<PublisherProfile[]>;
  getPendingPosts(profileId?: string): Promise<PublishResult[]>;
}
