import { POST_STYLES, type GeneratedPost, type PostStyle, type RecordWithReplies } from '../../types';
import { errorMessage } from '../../utils/errors';
import { logger as rootLogger, type Logger } from '../../utils/logger';
import { buildContext, buildPrompt } from './prompt';
import type { TextGenerator } from './textGenerator';

export interface GenerateBatchOptions {
  styles?: readonly PostStyle[];
  /** Use this style for every record instead of rotating */
  pinnedStyle?: PostStyle;
  includeCta?: boolean;
}

export class GenerationOrchestrator {
  private readonly log: Logger;

  constructor(
    private readonly generator: TextGenerator,
    logger: Logger = rootLogger,
    private readonly clock: () => Date = () => new Date()
  ) {
    this.log = logger.child({ component: 'generation' });
  }

  async generatePost(record: RecordWithReplies, style: PostStyle, includeCta: boolean = true): Promise<GeneratedPost> {
    const prompt = buildPrompt(buildContext(record.thread, record.replies), style, includeCta);
    const content = await this.generator.generate(prompt);

    return {
      content,
      sourceTitle: record.thread.title,
      sourceUrl: record.thread.url,
      generatedAt: this.clock().toISOString(),
      style,
    };
  }

  /**
   * Generate one post per record, in order. Styles rotate by index unless one
   * is pinned. A failed record is logged and left out, so the result can be
   * shorter than the input.
   */
  async generateBatch(records: readonly RecordWithReplies[], options: GenerateBatchOptions = {}): Promise<GeneratedPost[]> {
    const styles = options.styles && options.styles.length > 0 ? options.styles : POST_STYLES;
    const posts: GeneratedPost[] = [];

    for (const [i, record] of records.entries()) {
      const style = options.pinnedStyle ?? styles[i % styles.length];

      try {
        posts.push(await this.generatePost(record, style, options.includeCta ?? true));
        this.log.info(`✓ Generated post ${i + 1}/${records.length} (${style})`);
      } catch (error) {
        this.log.error({ error: errorMessage(error), threadId: record.thread.id }, `✗ Error generating post ${i + 1}`);
      }
    }

    this.log.info(`Generated ${posts.length} of ${records.length} posts`);
    return posts;
  }
}

/**
 * Plain-text rendering for human review
 */
export function formatForReview(posts: readonly GeneratedPost[]): string {
  const divider = '='.repeat(60);
  const output: string[] = [];

  posts.forEach((post, i) => {
    output.push(`\n${divider}`);
    output.push(`POST #${i + 1} | Style: ${post.style}`);
    output.push(`Source: ${post.sourceTitle.slice(0, 60)}...`);
    output.push(`${divider}\n`);
    output.push(post.content);
    output.push(`\n\n📎 Source: ${post.sourceUrl}`);
    output.push(`🕐 Generated: ${post.generatedAt}`);
  });

  return output.join('\n');
}
