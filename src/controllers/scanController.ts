import type { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { ServiceFactory } from '../services/factory';
import { filterByRelevance, sortThreads } from '../services/ranker';
import { trendingTopics } from '../services/topicsService';
import { SORT_ORDERS, type Reply, type Thread } from '../types';
import { sendError } from './errors';

// Scan endpoints only read the forums; nothing is generated or written.

const scanSchema = z.object({
  limit: z.number().int().min(1).max(100).optional().default(30),
  top: z.number().int().min(1).max(100).optional().default(10),
  minRelevance: z.number().min(0).max(1).optional().default(0.15),
  sortBy: z.enum(SORT_ORDERS).optional().default('relevance_date'),
  comments: z.boolean().optional().default(false),
});

const topicsSchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).optional().default(50),
});

export class ScanController {
  constructor(private readonly services: ServiceFactory) {}

  /**
   * Scan every source and return the top relevant threads
   */
  async scan(request: FastifyRequest, reply: FastifyReply) {
    try {
      const validatedData = scanSchema.parse(request.body ?? {});

      const reddit = this.services.reddit();
      const scan = await this.services.aggregator(reddit).scan(this.services.config.sources, validatedData.limit);
      const relevant = filterByRelevance(sortThreads(scan.threads, validatedData.sortBy), validatedData.minRelevance);
      const top = relevant.slice(0, validatedData.top);

      const threads: { thread: Thread; topReplies?: Reply[] }[] = [];
      for (const thread of top) {
        if (validatedData.comments && thread.numComments > 0) {
          const replies = await reddit.fetchReplies(thread.source, thread.id, 2);
          threads.push({ thread, topReplies: replies });
        } else {
          threads.push({ thread });
        }
      }

      return reply.send({
        success: true,
        message: `Found ${relevant.length} relevant threads out of ${scan.threads.length}`,
        data: {
          totalScanned: scan.threads.length,
          relevantCount: relevant.length,
          sources: scan.sources,
          threads,
        },
      });
    } catch (error) {
      return sendError(reply, error, 'Scan');
    }
  }

  /**
   * Keyword mention counts across a fresh scan
   */
  async topics(request: FastifyRequest, reply: FastifyReply) {
    try {
      const { limit } = topicsSchema.parse(request.query ?? {});

      const scan = await this.services.aggregator().scan(this.services.config.sources, limit);
      const topics = trendingTopics(scan.threads, this.services.scorer);

      return reply.send({
        success: true,
        count: scan.threads.length,
        data: topics,
      });
    } catch (error) {
      return sendError(reply, error, 'Topics');
    }
  }
}
