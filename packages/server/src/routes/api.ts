import type { FastifyInstance, FastifyRequest } from "fastify";
import { parseIdentity } from "@calendar-bot/core";

type TokenRequest = FastifyRequest<{ Querystring: { token?: string } }>;

/**
 * Export token from `?token=` or `Authorization: Bearer <token>`
 */
function tokenFrom(request: TokenRequest): string {
  if (request.query.token) return request.query.token;
  const header = request.headers.authorization ?? "";
  const match = /^Bearer\s+(\S+)$/i.exec(header);
  return match ? match[1] : "";
}

export async function registerApiRoutes(fastify: FastifyInstance): Promise<void> {
  // GET /api/public/events?owner=<id>: events the owner published
  fastify.get<{ Querystring: { owner?: string } }>(
    "/api/public/events",
    async (request, reply) => {
      const owner = parseIdentity(request.query.owner ?? "");
      if (owner === null) {
        return reply.code(400).send({ error: "owner must be a positive numeric user ID" });
      }
      const events = fastify.events.listPublic(owner).map((event) => ({
        id: event.id,
        title: event.title,
        date: event.date,
        time: event.time,
        details: event.details,
      }));
      return { owner, events };
    },
  );

  // GET /api/my/events: all of the token owner's events
  fastify.get<{ Querystring: { token?: string } }>("/api/my/events", async (request) => {
    const owner = fastify.exportTokens.redeem(tokenFrom(request), fastify.exportMaxAgeSeconds);
    return { owner, events: fastify.events.listByOwner(owner) };
  });

  // GET /api/my/appointments: invitations the token owner takes part in
  fastify.get<{ Querystring: { token?: string } }>("/api/my/appointments", async (request) => {
    const owner = fastify.exportTokens.redeem(tokenFrom(request), fastify.exportMaxAgeSeconds);
    return { owner, appointments: fastify.scheduling.listFor(owner) };
  });
}
