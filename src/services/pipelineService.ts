import type { PipelineResult, PostStyle, RecordWithReplies, SortBy, Thread } from '../types';
import { ConfigurationError, errorMessage } from '../utils/errors';
import { logger as rootLogger, type Logger } from '../utils/logger';
import { AggregatorService } from './aggregatorService';
import { GenerationOrchestrator } from './generation/orchestrator';
import type { TextGenerator } from './generation/textGenerator';
import { extractInsights } from './insightExtractor';
import { filterByRelevance, sortThreads } from './ranker';
import type { RedditService } from './redditService';
import { saveResults } from './reportService';

export interface PipelineOptions {
  perSourceLimit?: number;
  minRelevance?: number;
  maxRecords?: number;
  repliesPerRecord?: number;
  sortBy?: SortBy;
  generate?: boolean;
  style?: PostStyle;
  /** Skip writing report files */
  dryRun?: boolean;
}

export interface PipelineDeps {
  reddit: RedditService;
  sources: readonly string[];
  outputDir: string;
  /** Called only when generation runs; may throw ConfigurationError */
  createGenerator: () => TextGenerator;
  logger?: Logger;
  clock?: () => Date;
}

/**
 * Scan → rank → filter → replies and insights → generate → report.
 */
export class PipelineService {
  private readonly log: Logger;
  private readonly aggregator: AggregatorService;
  private readonly clock: () => Date;

  constructor(private readonly deps: PipelineDeps) {
    const logger = deps.logger ?? rootLogger;
    this.log = logger.child({ component: 'pipeline' });
    this.aggregator = new AggregatorService(deps.reddit, logger);
    this.clock = deps.clock ?? (() => new Date());
  }

  async run(options: PipelineOptions = {}): Promise<PipelineResult> {
    const {
      perSourceLimit = 30,
      minRelevance = 0.15,
      maxRecords = 10,
      repliesPerRecord = 5,
      sortBy = 'relevance_date',
      generate = true,
      style,
      dryRun = false,
    } = options;

    const startedAt = this.clock();
    const result: PipelineResult = {
      runTimestamp: startedAt.toISOString(),
      config: { perSourceLimit, minRelevance, maxRecords },
      stats: { totalScanned: 0, relevantThreads: 0 },
      sources: [],
      records: [],
      generatedPosts: [],
    };

    this.log.info('STEP 1: Scanning sources');
    const scan = await this.aggregator.scan(this.deps.sources, perSourceLimit);
    result.sources = scan.sources;
    result.stats.totalScanned = scan.threads.length;

    this.log.info('STEP 2: Sorting & filtering by relevance');
    const relevant = filterByRelevance(sortThreads(scan.threads, sortBy, startedAt), minRelevance);
    result.stats.relevantThreads = relevant.length;
    this.log.info(`✓ Found ${relevant.length} relevant threads`);

    this.log.info('STEP 3: Analyzing replies for insights');
    result.records = await this.collectReplies(relevant.slice(0, maxRecords), repliesPerRecord);

    if (generate) {
      this.log.info('STEP 4: Generating LinkedIn posts');
      try {
        const orchestrator = new GenerationOrchestrator(this.deps.createGenerator(), this.deps.logger ?? rootLogger, this.clock);
        result.generatedPosts = await orchestrator.generateBatch(result.records, { pinnedStyle: style });
        result.stats.postsGenerated = result.generatedPosts.length;
      } catch (error) {
        if (!(error instanceof ConfigurationError)) throw error;
        result.generationError = error.message;
        this.log.error(`❌ Generation skipped: ${error.message}`);
      }
    }

    if (!dryRun) {
      this.log.info('STEP 5: Saving results');
      result.files = await saveResults(result, this.deps.outputDir, startedAt);
    }

    return result;
  }

  private async collectReplies(
    threads: Thread[],
    repliesPerRecord: number
  ): Promise<RecordWithReplies[]> {
    const records: RecordWithReplies[] = [];

    for (const [i, thread] of threads.entries()) {
      this.log.info(`[${i + 1}/${threads.length}] ${thread.title.slice(0, 50)}...`);

      try {
        const replies = await this.deps.reddit.fetchReplies(thread.source, thread.id, repliesPerRecord);
        records.push({ thread, replies, insights: extractInsights(replies) });
        this.log.info(`  ✓ Got ${replies.length} replies`);
      } catch (error) {
        this.log.warn({ threadId: thread.id, error: errorMessage(error) }, '  ✗ Could not load replies');
        records.push({ thread, replies: [], insights: [] });
      }
    }

    return records;
  }
}
