import type { ScanResult, SourceScanResult, Thread } from '../types';
import { errorMessage } from '../utils/errors';
import { logger as rootLogger, type Logger } from '../utils/logger';
import type { RedditService } from './redditService';

/**
 * Runs the listing crawl across every configured source and merges the results.
 */
export class AggregatorService {
  private readonly log: Logger;

  constructor(
    private readonly reddit: RedditService,
    logger: Logger = rootLogger
  ) {
    this.log = logger.child({ component: 'aggregator' });
  }

  /**
   * Scan each source twice (newest first, then hot with half the budget) and
   * keep the first copy of every thread id. A failing source contributes
   * nothing and does not stop the scan.
   */
  async scan(sources: readonly string[], perSourceLimit: number = 30): Promise<ScanResult> {
    this.log.info(`🔄 Scanning ${sources.length} sources (limit ${perSourceLimit} per source)...`);

    const threads: Thread[] = [];
    const seen = new Set<string>();
    const results: SourceScanResult[] = [];

    const merge = (batch: Thread[]): number => {
      let added = 0;
      for (const thread of batch) {
        if (seen.has(thread.id)) continue;
        seen.add(thread.id);
        threads.push(thread);
        added++;
      }
      return added;
    };

    for (const source of sources) {
      const result: SourceScanResult = { source, newCount: 0, hotCount: 0, added: 0 };

      try {
        this.log.info(`📡 Scanning r/${source}...`);

        const newThreads = await this.reddit.fetchThreads(source, 'new', perSourceLimit);
        result.newCount = newThreads.length;
        result.added += merge(newThreads);

        const hotThreads = await this.reddit.fetchThreads(source, 'hot', Math.floor(perSourceLimit / 2));
        result.hotCount = hotThreads.length;
        result.added += merge(hotThreads);

        this.log.info(`   ✓ r/${source}: ${result.added} new threads (${result.newCount} new, ${result.hotCount} hot)`);
      } catch (error) {
        result.error = errorMessage(error);
        this.log.error({ source, error: result.error }, `❌ Error scanning r/${source}`);
      }

      results.push(result);
    }

    this.log.info(`✅ Scan completed: ${threads.length} unique threads`);

    return { threads, sources: results };
  }
}
