import type { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { ServiceFactory } from '../services/factory';
import { publish, PUBLISH_METHODS } from '../services/publishers';
import { sendError } from './errors';

const methodSchema = z.union([z.literal('auto'), z.enum(PUBLISH_METHODS)]).optional().default('auto');

const profileIdSchema = z.string().trim().min(1).optional();

const publishSchema = z.object({
  text: z.string().trim().min(1, 'Post text is required'),
  method: methodSchema,
  scheduleAt: z
    .string()
    .datetime({ offset: true })
    .transform(str => new Date(str))
    .optional(),
  profileId: profileIdSchema,
});

const methodQuerySchema = z.object({
  method: methodSchema,
});

const pendingQuerySchema = methodQuerySchema.extend({
  profileId: profileIdSchema,
});

export class PublishController {
  constructor(private readonly services: ServiceFactory) {}

  /**
   * Post now, or schedule when `scheduleAt` is given
   */
  async publish(request: FastifyRequest, reply: FastifyReply) {
    try {
      const validatedData = publishSchema.parse(request.body);

      const publisher = this.services.publisher(validatedData.method);
      const result = await publish(publisher, validatedData.text, validatedData.scheduleAt, validatedData.profileId);

      return reply.send({
        success: true,
        message: validatedData.scheduleAt
          ? `Scheduled via ${publisher.name} for ${validatedData.scheduleAt.toISOString()}`
          : `Posted via ${publisher.name}`,
        data: result,
      });
    } catch (error) {
      return sendError(reply, error, 'Publish');
    }
  }

  async getProfiles(request: FastifyRequest, reply: FastifyReply) {
    try {
      const { method } = methodQuerySchema.parse(request.query ?? {});
      const publisher = this.services.publisher(method);
      const profiles = await publisher.getProfiles();

      return reply.send({
        success: true,
        backend: publisher.name,
        count: profiles.length,
        data: profiles,
      });
    } catch (error) {
      return sendError(reply, error, 'Get profiles');
    }
  }

  async getPending(request: FastifyRequest, reply: FastifyReply) {
    try {
      const { method, profileId } = pendingQuerySchema.parse(request.query ?? {});
      const publisher = this.services.publisher(method);
      const pending = await publisher.getPendingPosts(profileId);

      return reply.send({
        success: true,
        backend: publisher.name,
        count: pending.length,
        data: pending,
      });
    } catch (error) {
      return sendError(reply, error, 'Get pending posts');
    }
  }
}
