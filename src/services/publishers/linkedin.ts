import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { ConfigurationError, UnsupportedOperationError, errorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';
import type { Publisher, PublisherProfile, PublishResult } from './types';

const BASE_URL = 'https://api.linkedin.com/v2';

const userInfoSchema = z.object({
  sub: z.string(),
  name: z.string().optional(),
});

/**
 * LinkedIn's own API. Access tokens expire after 60 days and the API has no
 * scheduling.
 */
export class LinkedInPublisher implements Publisher {
  readonly name = 'linkedin' as const;
  private readonly client: AxiosInstance;

  constructor(
    accessToken: string | undefined,
    private readonly personId?: string,
    client?: AxiosInstance
  ) {
    if (!accessToken) {
      throw new ConfigurationError(
        'LINKEDIN_ACCESS_TOKEN not found. Complete the OAuth flow for an app with the w_member_social permission and set it in .env'
      );
    }

    this.client =
      client ??
      axios.create({
        baseURL: BASE_URL,
        headers: {
          Authorization: `Bearer ${accessToken}`,
          'Content-Type': 'application/json',
          'X-Restli-Protocol-Version': '2.0.0',
        },
      });
  }

  async getUserInfo(): Promise<z.infer<typeof userInfoSchema>> {
    const response = await this.client.get<unknown>('/userinfo');
    return userInfoSchema.parse(response.data);
  }

  async getProfiles(): Promise<PublisherProfile[]> {
    try {
      const info = await this.getUserInfo();
      return [{ service: 'linkedin', username: info.name ?? 'LinkedIn User', id: info.sub }];
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Could not load LinkedIn user info');
      return [{ service: 'linkedin', username: 'Direct API', id: 'unknown' }];
    }
  }

  async postNow(text: string): Promise<PublishResult> {
    const personId = this.personId ?? (await this.getUserInfo()).sub;

    const response = await this.client.post<PublishResult>('/ugcPosts', {
      author: `urn:li:person:${personId}`,
      lifecycleState: 'PUBLISHED',
      specificContent: {
        'com.linkedin.ugc.ShareContent': {
          shareCommentary: { text },
          shareMediaCategory: 'NONE',
        },
      },
      visibility: {
        'com.linkedin.ugc.MemberNetworkVisibility': 'PUBLIC',
      },
    });

    return response.data;
  }

  async schedulePost(_text: string, _scheduledAt: Date): Promise<PublishResult> {
    throw new UnsupportedOperationError('LinkedIn direct API', 'scheduling', 'Use Ayrshare or a Zapier/Make webhook.');
  }

  async getPendingPosts(): Promise<PublishResult[]> {
    return [];
  }
}
