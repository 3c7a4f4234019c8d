/**
 * Admin API Routes
 *
 * Statistics and test-message injection. All routes are localhost-only.
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { ulid } from "ulid";
import { z } from "zod";

/**
 * Localhost-only middleware
 */
function localhostOnly(request: FastifyRequest, reply: FastifyReply, done: () => void) {
  const ip = request.ip;
  const isLocalhost = ip === "127.0.0.1" || ip === "::1" || ip === "::ffff:127.0.0.1";

  if (!isLocalhost) {
    reply.code(403).send({ error: "Admin API is localhost-only" });
    return;
  }
  done();
}

const simulateBodySchema = z
  .object({
    from: z.string().min(1),
    content: z.string().default(""),
    buttonId: z.string().min(1).optional(),
    username: z.string().optional(),
    senderName: z.string().optional(),
  })
  .refine((body) => body.content.trim() !== "" || body.buttonId !== undefined, {
    message: "content or buttonId is required",
  });

const statsQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(366).default(30),
});

/**
 * Register admin routes
 */
export async function registerAdminRoutes(fastify: FastifyInstance): Promise<void> {
  // Apply localhost-only middleware to all admin routes
  fastify.addHook("onRequest", localhostOnly);

  /**
   * GET /stats?limit=30
   *
   * Daily counters, newest first, plus totals over all days
   */
  fastify.get("/stats", async (request, reply) => {
    const query = statsQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.code(400).send({ error: "limit must be an integer between 1 and 366" });
    }
    return {
      days: fastify.statistics.list(query.data.limit),
      totals: fastify.statistics.totals(),
    };
  });

  /**
   * POST /channels/:id/simulate-message
   *
   * Feed a message into a channel as if a user had sent it.
   * Processing is asynchronous; replies go out through the channel.
   */
  fastify.post<{ Params: { id: string } }>(
    "/channels/:id/simulate-message",
    async (request, reply) => {
      const body = simulateBodySchema.safeParse(request.body ?? {});
      if (!body.success) {
        return reply.code(400).send({ error: body.error.issues.map((i) => i.message).join("; ") });
      }

      const { id } = request.params;
      const messageId = `sim-${ulid()}`;
      const accepted = fastify.channelManager.inject(id, {
        id: messageId,
        from: body.data.from,
        content: body.data.content,
        timestamp: new Date(),
        channelId: id,
        buttonId: body.data.buttonId,
        username: body.data.username,
        senderName: body.data.senderName,
      });
      if (!accepted) {
        return reply.code(404).send({ error: `Channel not found: ${id}` });
      }
      return reply.code(202).send({ accepted: true, messageId });
    },
  );
}
