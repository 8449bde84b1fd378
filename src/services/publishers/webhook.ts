import axios, { type AxiosInstance } from 'axios';
import { ConfigurationError } from '../../utils/errors';
import type { Publisher, PublisherProfile, PublishResult } from './types';

interface WebhookTarget {
  name: 'zapier' | 'make';
  label: string;
  envVar: string;
  setupHint: string;
}

const TARGETS: Record<'zapier' | 'make', WebhookTarget> = {
  zapier: {
    name: 'zapier',
    label: 'Zapier',
    envVar: 'ZAPIER_WEBHOOK_URL',
    setupHint: 'Create a Zap at https://zapier.com with a Webhook trigger and a LinkedIn action',
  },
  make: {
    name: 'make',
    label: 'Make.com',
    envVar: 'MAKE_WEBHOOK_URL',
    setupHint: 'Create a scenario at https://make.com with Webhook → LinkedIn',
  },
};

/**
 * Hands the text to an automation webhook (Zapier or Make), which does the
 * actual posting and scheduling. Webhooks keep no queue, so there is nothing
 * to list as pending.
 */
export class WebhookPublisher implements Publisher {
  readonly name: 'zapier' | 'make';
  private readonly target: WebhookTarget;
  private readonly client: AxiosInstance;
  private readonly url: string;

  constructor(
    kind: 'zapier' | 'make',
    webhookUrl: string | undefined,
    client?: AxiosInstance,
    private readonly clock: () => Date = () => new Date()
  ) {
    this.target = TARGETS[kind];
    this.name = kind;

    if (!webhookUrl) {
      throw new ConfigurationError(`${this.target.envVar} not found. ${this.target.setupHint}`);
    }

    this.url = webhookUrl;
    this.client = client ?? axios.create();
  }

  async getProfiles(): Promise<PublisherProfile[]> {
    return [{ service: 'linkedin', username: `via ${this.target.label}`, id: this.target.name }];
  }

  async postNow(text: string): Promise<PublishResult> {
    await this.send({
      text,
      timestamp: this.clock().toISOString(),
      action: 'post_now',
    });
    return { status: `sent_to_${this.target.name}`, text };
  }

  async schedulePost(text: string, scheduledAt: Date): Promise<PublishResult> {
    await this.send({
      text,
      scheduled_at: scheduledAt.toISOString(),
      action: 'schedule',
    });
    return { status: `sent_to_${this.target.name}`, scheduled_at: scheduledAt.toISOString() };
  }

  async getPendingPosts(): Promise<PublishResult[]> {
    return [];
  }

  private async send(payload: Record<string, string>): Promise<void> {
    await this.client.post(this.url, payload);
  }
}
