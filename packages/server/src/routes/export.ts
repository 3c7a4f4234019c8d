/**
 * Export download routes
 *
 * GET /export/:format?token=<export token>
 *
 * The token is the only credential. Forged and expired tokens both get
 * 403 "invalid link" through the server error handler.
 */

import type { FastifyInstance } from "fastify";
import { isExportFormat, toCsv, toExportRows, toJsonExport } from "@calendar-bot/core";

export async function registerExportRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get<{
    Params: { format: string };
    Querystring: { token?: string };
  }>("/export/:format", async (request, reply) => {
    const { format } = request.params;
    if (!isExportFormat(format)) {
      return reply.code(400).send({ error: `Unknown export format: ${format}` });
    }

    const owner = fastify.exportTokens.redeem(request.query.token ?? "", fastify.exportMaxAgeSeconds);
    const rows = toExportRows(fastify.events.listByOwner(owner));
    request.log.info({ owner, format, rows: rows.length }, "Export served");

    if (format === "csv") {
      return reply
        .header("content-type", "text/csv; charset=utf-8")
        .header("content-disposition", `attachment; filename="events_${owner}.csv"`)
        .send(toCsv(rows));
    }
    return toJsonExport(owner, rows);
  });
}
