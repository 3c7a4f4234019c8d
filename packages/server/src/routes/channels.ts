import type { FastifyInstance } from "fastify";

export async function registerChannelRoutes(fastify: FastifyInstance): Promise<void> {
  // GET /api/channels: all configured channels with status
  fastify.get("/api/channels", async () => fastify.channelManager.getChannelInfos());

  // GET /api/channels/:id
  fastify.get<{ Params: { id: string } }>("/api/channels/:id", async (request, reply) => {
    const info = fastify.channelManager.getChannelInfo(request.params.id);
    if (!info) {
      return reply.code(404).send({ error: `Channel not found: ${request.params.id}` });
    }
    return info;
  });
}
