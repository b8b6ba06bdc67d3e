import Fastify from "fastify";
import { getConfig } from "./config";
import { healthRoutes } from "./routes/health";
import { runsRoutes, type RunsRouteOptions } from "./routes/runs";
import { withRequestMeta } from "./utils/http-envelope";

export interface BuildServerOptions {
  logger?: boolean;
  runs?: RunsRouteOptions;
}

export async function buildServer(options: BuildServerOptions = {}) {
  const app = Fastify({ logger: options.logger ?? true });

  app.addHook("onSend", (request, reply, payload, done) => {
    reply.header("x-request-id", request.id);
    done(null, payload);
  });

  app.addHook("preSerialization", (request, _reply, payload, done) => {
    done(null, withRequestMeta(payload, request.id));
  });

  app.register(healthRoutes, { prefix: "/api/v1" });
  app.register(runsRoutes, {
    prefix: "/api/v1",
    ...(options.runs ?? {}),
  });

  return app;
}

export function getListenPort(): number {
  return getConfig().port;
}
