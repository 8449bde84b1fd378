import type { AxiosInstance } from 'axios';
import type { AppConfig } from '../config/env';
import { HttpFetcher } from '../utils/fetcher';
import { logger as rootLogger, type Logger } from '../utils/logger';
import { AggregatorService } from './aggregatorService';
import { AnthropicTextGenerator, type TextGenerator } from './generation/textGenerator';
import { PipelineService } from './pipelineService';
import { createPublisher, type PublishMethod, type Publisher } from './publishers';
import { RedditService } from './redditService';
import { RelevanceScorer } from './relevanceScorer';

export interface ServiceFactoryOptions {
  config: AppConfig;
  logger?: Logger;
  scorer?: RelevanceScorer;
  /** One fetcher per run; override to stub HTTP */
  createFetcher?: () => HttpFetcher;
  createGenerator?: () => TextGenerator;
  publisherClient?: AxiosInstance;
}

/**
 * Builds the per-request service graph. Each call to `reddit()` gets a fresh
 * fetcher so backoff and identity state never leak between runs.
 */
export class ServiceFactory {
  readonly config: AppConfig;
  readonly scorer: RelevanceScorer;
  private readonly logger: Logger;

  constructor(private readonly options: ServiceFactoryOptions) {
    this.config = options.config;
    this.scorer = options.scorer ?? new RelevanceScorer();
    this.logger = options.logger ?? rootLogger;
  }

  reddit(): RedditService {
    const fetcher = this.options.createFetcher ? this.options.createFetcher() : new HttpFetcher({ logger: this.logger });
    return new RedditService({
      fetcher,
      scorer: this.scorer,
      baseUrl: this.config.sourceBaseUrl,
      logger: this.logger,
    });
  }

  aggregator(reddit: RedditService = this.reddit()): AggregatorService {
    return new AggregatorService(reddit, this.logger);
  }

  generator(): TextGenerator {
    if (this.options.createGenerator) {
      return this.options.createGenerator();
    }
    return new AnthropicTextGenerator({
      apiKey: this.config.anthropic.apiKey,
      model: this.config.anthropic.model,
    });
  }

  pipeline(): PipelineService {
    return new PipelineService({
      reddit: this.reddit(),
      sources: this.config.sources,
      outputDir: this.config.outputDir,
      createGenerator: () => this.generator(),
      logger: this.logger,
    });
  }

  publisher(method: PublishMethod | 'auto'): Publisher {
    return createPublisher(method, this.config.publishing, this.options.publisherClient);
  }
}
