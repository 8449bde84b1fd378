import type { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { ServiceFactory } from '../services/factory';
import { POST_STYLES, SORT_ORDERS } from '../types';
import { sendError } from './errors';

const pipelineSchema = z.object({
  limit: z.number().int().min(1).max(100).optional().default(30),
  count: z.number().int().min(1).max(50).optional().default(10),
  minRelevance: z.number().min(0).max(1).optional().default(0.15),
  repliesPerRecord: z.number().int().min(0).max(25).optional().default(5),
  generate: z.boolean().optional().default(true),
  sortBy: z.enum(SORT_ORDERS).optional().default('relevance_date'),
  style: z.enum(POST_STYLES).optional(),
  dryRun: z.boolean().optional().default(false),
});

export class PipelineController {
  constructor(private readonly services: ServiceFactory) {}

  /**
   * Run the full scan → generate pipeline
   */
  async run(request: FastifyRequest, reply: FastifyReply) {
    try {
      const validatedData = pipelineSchema.parse(request.body ?? {});

      const result = await this.services.pipeline().run({
        perSourceLimit: validatedData.limit,
        maxRecords: validatedData.count,
        minRelevance: validatedData.minRelevance,
        repliesPerRecord: validatedData.repliesPerRecord,
        sortBy: validatedData.sortBy,
        generate: validatedData.generate,
        style: validatedData.style,
        dryRun: validatedData.dryRun,
      });

      const generated = result.stats.postsGenerated ?? 0;

      return reply.send({
        success: true,
        message: validatedData.generate
          ? `Generated ${generated} of ${result.records.length} posts from ${result.stats.relevantThreads} relevant threads`
          : `Found ${result.stats.relevantThreads} relevant threads`,
        data: result,
      });
    } catch (error) {
      return sendError(reply, error, 'Pipeline');
    }
  }
}
