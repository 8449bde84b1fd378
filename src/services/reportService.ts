import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import type { PipelineResult } from '../types';
import { logger } from '../utils/logger';
import { formatForReview } from './generation/orchestrator';

const pad = (value: number, width: number = 2): string => String(value).padStart(width, '0');

/**
 * `YYYYMMDD_HHMMSS_mmm` in UTC
 */
export function fileTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}` +
    `_${pad(date.getUTCMilliseconds(), 3)}`
  );
}

export function renderSummary(result: PipelineResult): string {
  const { stats } = result;
  const lines = [
    '# Reddit → LinkedIn Pipeline Report',
    '',
    `**Run Time:** ${result.runTimestamp}`,
    '',
    '## Statistics',
    '',
    '| Metric | Value |',
    '|--------|-------|',
    `| Posts Scanned | ${stats.totalScanned} |`,
    `| Relevant Posts | ${stats.relevantThreads} |`,
    `| LinkedIn Posts Generated | ${stats.postsGenerated ?? 'N/A'} |`,
    '',
    '## Top Reddit Posts Analyzed',
    '',
  ];

  result.records.slice(0, 5).forEach(({ thread, insights }, i) => {
    lines.push(
      `### ${i + 1}. ${thread.title.slice(0, 70)}...`,
      '',
      `- **Subreddit:** r/${thread.source}`,
      `- **Engagement:** ${thread.score} upvotes, ${thread.numComments} comments`,
      `- **Relevance Score:** ${thread.relevance.combined.toFixed(2)}`,
      `- **URL:** ${thread.url}`,
      ''
    );

    if (insights.length > 0) {
      lines.push('**Key Insights from Comments:**', ...insights.map(insight => `- ${insight}`));
    }

    lines.push('', '---', '');
  });

  if (result.generationError) {
    lines.push('', '## Generation', '', `Generation skipped: ${result.generationError}`);
  } else if (result.generatedPosts.length > 0) {
    lines.push(
      '',
      '## Generated LinkedIn Posts',
      '',
      `Generated ${result.generatedPosts.length} posts ready for review.`,
      'See `linkedin_posts_*.txt` for full content.'
    );
  }

  return lines.join('\n') + '\n';
}

/**
 * Write the run's artifacts. Files are created exclusively, so an existing
 * report is never overwritten. Returns the written paths.
 */
export async function saveResults(result: PipelineResult, outputDir: string, now: Date = new Date()): Promise<string[]> {
  await mkdir(outputDir, { recursive: true });

  const timestamp = fileTimestamp(now);
  const written: string[] = [];

  const write = async (name: string, contents: string): Promise<void> => {
    const filePath = path.join(outputDir, name);
    await writeFile(filePath, contents, { encoding: 'utf-8', flag: 'wx' });
    written.push(filePath);
    logger.info(`✓ Saved ${filePath}`);
  };

  await write(`pipeline_results_${timestamp}.json`, JSON.stringify(result, null, 2));

  if (result.generatedPosts.length > 0) {
    await write(`linkedin_posts_${timestamp}.txt`, formatForReview(result.generatedPosts));
  }

  await write(`summary_${timestamp}.md`, renderSummary(result));

  return written;
}
