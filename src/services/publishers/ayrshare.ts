import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { ConfigurationError } from '../../utils/errors';
import type { Publisher, PublisherProfile, PublishResult } from './types';

const BASE_URL = 'https://app.ayrshare.com/api';

const profilesSchema = z.object({
  profiles: z
    .array(
      z.object({
        id: z.string().optional(),
        profileKey: z.string().optional(),
        title: z.string().optional(),
      })
    )
    .default([]),
});

const historySchema = z.object({
  posts: z.array(z.record(z.unknown())).default([]),
});

/**
 * Paid Ayrshare API; supports scheduling and lists scheduled posts.
 */
export class AyrsharePublisher implements Publisher {
  readonly name = 'ayrshare' as const;
  private readonly client: AxiosInstance;

  constructor(apiKey: string | undefined, client?: AxiosInstance) {
    if (!apiKey) {
      throw new ConfigurationError('AYRSHARE_API_KEY not found. Sign up at https://www.ayrshare.com and set it in .env');
    }

    this.client =
      client ??
      axios.create({
        baseURL: BASE_URL,
        headers: {
          Authorization: `Bearer ${apiKey}`,
          'Content-Type': 'application/json',
        },
      });
  }

  async getProfiles(): Promise<PublisherProfile[]> {
    const response = await this.client.get<unknown>('/profiles');
    return profilesSchema.parse(response.data).profiles.map(profile => ({
      service: 'linkedin',
      username: profile.title ?? 'Ayrshare profile',
      id: profile.profileKey ?? profile.id ?? 'unknown',
    }));
  }

  async postNow(text: string, profileId?: string): Promise<PublishResult> {
    const response = await this.client.post<PublishResult>('/post', {
      post: text,
      platforms: ['linkedin'],
      ...(profileId ? { profileKey: profileId } : {}),
    });
    return response.data;
  }

  async schedulePost(text: string, scheduledAt: Date, profileId?: string): Promise<PublishResult> {
    const response = await this.client.post<PublishResult>('/post', {
      post: text,
      platforms: ['linkedin'],
      scheduleDate: scheduledAt.toISOString(),
      ...(profileId ? { profileKey: profileId } : {}),
    });
    return response.data;
  }

  async getPendingPosts(profileId?: string): Promise<PublishResult[]> {
    const response = await this.client.get<unknown>('/history', {
      params: { status: 'scheduled' },
      // Ayrshare selects a user profile through this header on reads
      ...(profileId ? { headers: { 'Profile-Key': profileId } } : {}),
    });
    return historySchema.parse(response.data).posts;
  }
}
