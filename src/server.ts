import Fastify from "fastify";
import { z } from "zod";
import type { AppConfig } from "./config.js";
import type { AppDatabase } from "./db.js";
import { isDateError } from "./lib/errors.js";
import { findSqlFunction, SQL_FUNCTIONS } from "./services/functions.js";

interface ServerDeps {
  config: Pick<AppConfig, "logLevel">;
  db: AppDatabase;
}

const argsSchema = z.object({
  args: z.array(z.union([z.string(), z.number(), z.null()])).default([])
});

export function createHttpServer(deps: ServerDeps) {
  const app = Fastify({ logger: { level: deps.config.logLevel } });

  app.setErrorHandler((error, request, reply) => {
    if (isDateError(error)) {
      request.log.info({ code: error.code, input: error.input }, error.message);
      reply.code(400).send({ error: error.code, message: error.message, input: error.input });
      return;
    }

    request.log.error(error);
    reply.code(error.statusCode ?? 500).send({ error: "InternalError", message: error.message });
  });

  app.get("/health", async () => {
    return {
      ok: true,
      timestamp: new Date().toISOString()
    };
  });

  app.get("/functions", async () => {
    return SQL_FUNCTIONS.map((definition) => ({
      name: definition.name,
      params: definition.params
    }));
  });

  app.post<{ Params: { name: string } }>("/functions/:name", async (request, reply) => {
    const definition = findSqlFunction(request.params.name);
    if (!definition) {
      reply.code(404).send({ error: "UnknownFunction", message: `No function named ${request.params.name}` });
      return;
    }

    const body = argsSchema.safeParse(request.body ?? {});
    if (!body.success) {
      reply.code(400).send({ error: "InvalidRequest", message: body.error.issues[0]?.message ?? "Invalid body" });
      return;
    }

    const result = deps.db.callFunction(definition.name, body.data.args);
    return { result };
  });

  return app;
}
